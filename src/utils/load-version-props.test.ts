import { describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadVersionProps, parseVersionProps } from "./load-version-props";
import { Logger } from "./logger";

describe("parseVersionProps", () => {
  it("splits on the first equals sign and trims", () => {
    expect(parseVersionProps("revnumber = 9.0-EN\nrevremark=a=b\r\nrevdate=July 2025\n")).toEqual({
      revnumber: "9.0-EN",
      revremark: "a=b",
      revdate: "July 2025",
    });
  });

  it("ignores lines without a key or separator", () => {
    expect(parseVersionProps("# comment\n=orphan\n\nrevnumber=1")).toEqual({ revnumber: "1" });
  });
});

describe("loadVersionProps", () => {
  it("returns an empty map when the file is missing", async () => {
    expect(await loadVersionProps("/nonexistent/version.properties", new Logger("error"))).toEqual({});
  });

  it("reads the file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "docmatrix-props-"));
    try {
      const path = join(dir, "version.properties");
      await writeFile(path, "revnumber=2.1\n");

      expect(await loadVersionProps(path, new Logger("error"))).toEqual({ revnumber: "2.1" });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
