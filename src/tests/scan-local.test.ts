import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { createIgnorer } from "../ignore.js";
import { listLocalMediaFiles, normalizeExtensions } from "../scan-local.js";
import { writeFile } from "./util.js";

describe("local media enumeration", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(join(os.tmpdir(), "mediasync-scan-"));
    await writeFile(tmp, "a.jpg", "a");
    await writeFile(tmp, "B.JPG", "b");
    await writeFile(tmp, "notes.txt", "n");
    await writeFile(tmp, "x.png", "x");
    await writeFile(tmp, "sub/c.mp4", "c");
    await writeFile(tmp, "skip/d.jpg", "d");
    await fsp.mkdir(join(tmp, "folder.jpg"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("extensions are lowercased and dotted", () => {
    expect(normalizeExtensions(["JPG", ".mp4", " ", ".jpg"])).toEqual([".jpg", ".mp4"]);
  });

  test("media files only, sorted, case-insensitive", async () => {
    const files = await listLocalMediaFiles({
      root: tmp,
      extensions: ["jpg", "mp4"],
    });
    expect(files).toEqual([
      join(tmp, "B.JPG"),
      join(tmp, "a.jpg"),
      join(tmp, "skip/d.jpg"),
      join(tmp, "sub/c.mp4"),
    ]);
  });

  test("ignore patterns prune files and directories", async () => {
    const files = await listLocalMediaFiles({
      root: tmp,
      extensions: [".jpg", ".png", ".mp4"],
      ignore: ["skip/", "*.png"],
    });
    expect(files).toEqual([join(tmp, "B.JPG"), join(tmp, "a.jpg"), join(tmp, "sub/c.mp4")]);
  });

  test("enumeration settles on a tree with no media", async () => {
    const empty = join(tmp, "empty");
    await writeFile(empty, "notes/readme.txt", "r");
    await expect(listLocalMediaFiles({ root: empty, extensions: [".jpg"] })).resolves.toEqual([]);
  }, 2000);

  test("ignorer treats a trailing slash as directories only", () => {
    const ig = createIgnorer(["raw/"]);
    expect(ig.ignoresDir("raw")).toBe(true);
    expect(ig.ignoresFile("raw")).toBe(false);
    expect(ig.ignoresFile("raw/x.jpg")).toBe(true);
  });
});
