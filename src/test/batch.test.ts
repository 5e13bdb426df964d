import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createBatch, listFiles } from "../batch.js";

describe("createBatch", () => {
  it("indexes by position among the selected files", () => {
    expect(createBatch(["/d/b.jpg", "/d/a.jpg"])).toEqual([
      { originalPath: "/d/b.jpg", index: 0 },
      { originalPath: "/d/a.jpg", index: 1 },
    ]);
  });

  it("keeps the first of repeated paths", () => {
    expect(createBatch(["/d/a.jpg", "/d/b.jpg", "/d/./a.jpg"])).toEqual([
      { originalPath: "/d/a.jpg", index: 0 },
      { originalPath: "/d/b.jpg", index: 1 },
    ]);
  });

  it("indexes by position in the folder listing, in listing order", () => {
    const listing = ["/d/a.jpg", "/d/b.jpg", "/d/c.jpg", "/d/d.jpg"];
    expect(createBatch(["/d/d.jpg", "/d/b.jpg"], { indexBy: "listing", listing })).toEqual([
      { originalPath: "/d/b.jpg", index: 1 },
      { originalPath: "/d/d.jpg", index: 3 },
    ]);
  });

  it("rejects listing mode without a listing or with a file outside it", () => {
    expect(() => createBatch(["/d/a.jpg"], { indexBy: "listing" })).toThrow(
      'indexBy "listing" requires the folder listing.',
    );
    expect(() => createBatch(["/d/z.jpg"], { indexBy: "listing", listing: ["/d/a.jpg"] })).toThrow(
      "Selected file is not in the folder listing: /d/z.jpg",
    );
  });
});

describe("listFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "nomen-list-"));
    for (const name of ["c.txt", "b.JPG", "a.png"]) writeFileSync(join(dir, name), name);
    mkdirSync(join(dir, "sub.jpg"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists regular files sorted by name", () => {
    expect(listFiles(dir)).toEqual([join(dir, "a.png"), join(dir, "b.JPG"), join(dir, "c.txt")]);
  });

  it("filters by extension, ignoring case and the leading dot", () => {
    expect(listFiles(dir, { extensions: ["jpg", ".PNG"] })).toEqual([join(dir, "a.png"), join(dir, "b.JPG")]);
  });
});
