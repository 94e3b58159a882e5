import {
  destinationFor,
  duplicateCandidate,
  pickDuplicateName,
} from "../dest-path.js";

describe("destination paths", () => {
  test("keeps the position relative to the source root", () => {
    expect(destinationFor("/media/src/2021/trip/a.jpg", "/media/src", "/srv/photos")).toBe(
      "/srv/photos/2021/trip/a.jpg",
    );
  });

  test("falls back to the base name outside the source root", () => {
    expect(destinationFor("/elsewhere/b.jpg", "/media/src", "/srv/photos")).toBe(
      "/srv/photos/b.jpg",
    );
    expect(destinationFor("/media/src-other/c.jpg", "/media/src", "/srv/photos")).toBe(
      "/srv/photos/c.jpg",
    );
  });

  test("duplicate names count up from _DUP", () => {
    expect(duplicateCandidate("/srv/photos/y.jpg", 1)).toBe("/srv/photos/y_DUP.jpg");
    expect(duplicateCandidate("/srv/photos/y.jpg", 2)).toBe("/srv/photos/y_DUP2.jpg");
    expect(duplicateCandidate("/srv/photos/y.jpg", 3)).toBe("/srv/photos/y_DUP3.jpg");
    expect(duplicateCandidate("/srv/photos/archive.tar.gz", 1)).toBe(
      "/srv/photos/archive.tar_DUP.gz",
    );
    expect(duplicateCandidate("/srv/README", 1)).toBe("/srv/README_DUP");
  });

  test("picks the first free candidate", async () => {
    const taken = new Set(["/srv/y_DUP.jpg", "/srv/y_DUP2.jpg"]);
    const checked: string[] = [];
    const name = await pickDuplicateName("/srv/y.jpg", async (c) => {
      checked.push(c);
      return taken.has(c);
    });
    expect(name).toBe("/srv/y_DUP3.jpg");
    expect(checked).toEqual(["/srv/y_DUP.jpg", "/srv/y_DUP2.jpg", "/srv/y_DUP3.jpg"]);
  });

  test("without a check the first candidate wins", async () => {
    expect(await pickDuplicateName("/srv/y.jpg")).toBe("/srv/y_DUP.jpg");
  });
});
