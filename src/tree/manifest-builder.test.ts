import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import os from "node:os";

import {
  buildManifest,
  renderManifest,
  toEntry,
  writeManifest,
} from "./manifest-builder";
import { FilesystemError } from "../errors";
import { createFile } from "../test-utils";

describe("manifest builder", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "manifest-watch-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("buildManifest", () => {
    it("lists matching files sorted by relative path", async () => {
      await createFile(tempDir, "zeta.py");
      await createFile(tempDir, "docs/guide.md");
      await createFile(tempDir, "alpha.json");
      await createFile(tempDir, "image.png");

      const entries = await buildManifest(tempDir, {
        extensions: [".py", ".json", ".md"],
      });

      expect(entries).toEqual(["alpha.json", "docs/guide.md", "zeta.py"]);
    });

    it("prefixes entries with the base URL", async () => {
      await createFile(tempDir, "src/main.py");

      const entries = await buildManifest(tempDir, {
        extensions: [".py"],
        baseUrl: "https://example.com/raw/main",
      });

      expect(entries).toEqual(["https://example.com/raw/main/src/main.py"]);
    });

    it("skips excluded subtrees anywhere in the tree", async () => {
      await createFile(tempDir, ".git/config.json");
      await createFile(tempDir, "pkg/node_modules/dep/index.json");
      await createFile(tempDir, "pkg/package.json");

      const entries = await buildManifest(tempDir, {
        extensions: [".json"],
        exclude: [".git", "node_modules"],
      });

      expect(entries).toEqual(["pkg/package.json"]);
    });

    it("honours the ignore file", async () => {
      await createFile(tempDir, ".manifestignore", "build/\n*.tmp.py\n");
      await createFile(tempDir, "build/out.py");
      await createFile(tempDir, "scratch.tmp.py");
      await createFile(tempDir, "keep.py");

      const entries = await buildManifest(tempDir, {
        extensions: [".py"],
        ignoreFile: ".manifestignore",
      });

      expect(entries).toEqual(["keep.py"]);
    });

    it("passes over names gitignore rules cannot match", async () => {
      await createFile(tempDir, ".manifestignore", "*.tmp.py\n");
      await createFile(tempDir, "...");
      await createFile(tempDir, "keep.py");

      const entries = await buildManifest(tempDir, {
        extensions: [".py"],
        ignoreFile: ".manifestignore",
      });

      expect(entries).toEqual(["keep.py"]);
    });

    it("never lists skipped output paths", async () => {
      await createFile(tempDir, "notes.txt");
      const output = await createFile(tempDir, "manifest.txt");

      const entries = await buildManifest(tempDir, {
        extensions: [".txt"],
        skip: [output],
      });

      expect(entries).toEqual(["notes.txt"]);
    });

    it("does not loop through a symlink to an ancestor", async () => {
      await createFile(tempDir, "real/data.json");
      await fs.symlink(tempDir, path.join(tempDir, "real", "loop"), "dir");

      const entries = await buildManifest(tempDir, { extensions: [".json"] });

      expect(entries).toEqual(["real/data.json"]);
    });

    it("skips broken symlinks", async () => {
      await createFile(tempDir, "ok.json");
      await fs.symlink(
        path.join(tempDir, "missing.json"),
        path.join(tempDir, "dangling.json"),
      );

      const entries = await buildManifest(tempDir, { extensions: [".json"] });

      expect(entries).toEqual(["ok.json"]);
    });

    it("throws FilesystemError when the root does not exist", async () => {
      await expect(
        buildManifest(path.join(tempDir, "nope"), { extensions: [".py"] }),
      ).rejects.toBeInstanceOf(FilesystemError);
    });
  });

  describe("writeManifest", () => {
    it("writes newline-joined entries and is byte-identical on rerun", async () => {
      await createFile(tempDir, "b.json");
      await createFile(tempDir, "a.py");
      const output = path.join(tempDir, "out", "manifest.txt");
      const options = { extensions: [".py", ".json"], skip: [output] };

      await writeManifest(output, await buildManifest(tempDir, options));
      const first = await fs.readFile(output);
      await writeManifest(output, await buildManifest(tempDir, options));
      const second = await fs.readFile(output);

      expect(first.toString("utf-8")).toBe("a.py\nb.json");
      expect(second.equals(first)).toBe(true);
    });

    it("throws FilesystemError when the output is not writable", async () => {
      const blocker = await createFile(tempDir, "blocker");

      await expect(
        writeManifest(path.join(blocker, "manifest.txt"), ["a.py"]),
      ).rejects.toBeInstanceOf(FilesystemError);
    });
  });

  it("renders an empty manifest as an empty string", () => {
    expect(renderManifest([])).toBe("");
  });

  it("joins entries without a base URL as bare paths", () => {
    expect(toEntry("a/b.py")).toBe("a/b.py");
    expect(toEntry("a/b.py", "https://host/x")).toBe("https://host/x/a/b.py");
  });
});
