import { DuplicateRegistry } from "../duplicate-registry.js";

describe("DuplicateRegistry", () => {
  test("first registration of a hash stays canonical", () => {
    const r = new DuplicateRegistry();
    expect(r.isDuplicate("h1")).toBe(false);
    expect(r.registerRemote("h1", "/srv/photos/2020/x.jpg")).toBe(true);
    expect(r.registerRemote("h1", "/srv/photos/y_DUP.jpg")).toBe(false);
    expect(r.isDuplicate("h1")).toBe(true);
    expect(r.canonicalPath("h1")).toBe("/srv/photos/2020/x.jpg");
    expect(r.canonicalPath("h2")).toBeUndefined();
    expect(r.remoteCount).toBe(1);
  });

  test("already processed by path or by delivered content", () => {
    const r = new DuplicateRegistry();
    r.loadProcessed(
      new Map([
        ["/src/a.jpg", "ha"],
        ["/src/b.jpg", "hb"],
      ]),
    );
    r.addProcessedPaths(["/src/c.jpg"]);
    expect(r.alreadyProcessed("/src/a.jpg")).toBe(true);
    expect(r.alreadyProcessed("/src/c.jpg")).toBe(true);
    expect(r.alreadyProcessed("/src/moved/b.jpg")).toBe(false);
    expect(r.alreadyProcessed("/src/moved/b.jpg", "hb")).toBe(true);
    expect(r.alreadyProcessed("/src/new.jpg", "hz")).toBe(false);
    expect(r.processedCount).toBe(3);
  });

  test("destination content alone does not make a file processed", () => {
    const r = new DuplicateRegistry();
    r.registerRemote("h1", "/srv/x.jpg");
    expect(r.alreadyProcessed("/src/y.jpg", "h1")).toBe(false);
  });
});
