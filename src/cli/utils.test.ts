import { describe, it, expect } from "vitest";
import * as os from "node:os";
import * as path from "node:path";

import { shortenPath } from "./utils";

describe("shortenPath", () => {
  it("replaces the home directory with ~", () => {
    const file = path.join(os.homedir(), "project", "manifest.txt");
    expect(shortenPath(file)).toBe(`~${path.sep}project${path.sep}manifest.txt`);
  });

  it("leaves other paths alone", () => {
    expect(shortenPath("/srv/data/manifest.txt")).toBe("/srv/data/manifest.txt");
  });
});
