import { renderLogRows } from "../cli-log-output.js";
import { StructuredLogger } from "../logger.js";
import { DeferredSessionSink, fetchSessionLogs } from "../session-logs.js";
import { memoryStore } from "./util.js";

describe("session logs", () => {
  test("entries logged before the session exists are flushed on attach", () => {
    const store = memoryStore();
    const deferred = new DeferredSessionSink();
    let ts = 100;
    const logger = new StructuredLogger({ sink: deferred.sink, clock: () => ts++ });
    const log = logger.child("sync");

    log.info("resume check", { pair: "/src -> /dest" });
    expect(deferred.pendingCount).toBe(1);

    const id = store.startSession("/src", "/dest");
    deferred.attach(store.db, id);
    expect(deferred.pendingCount).toBe(0);
    log.child("pipeline").warn("hash computation failed", { path: "/src/x.jpg" });
    log.debug("noise");

    const rows = fetchSessionLogs(store.db, id);
    expect(rows.map((r) => [r.ts, r.level, r.scope, r.message, r.meta])).toEqual([
      [100, "info", "sync", "resume check", { pair: "/src -> /dest" }],
      [101, "warn", "sync.pipeline", "hash computation failed", { path: "/src/x.jpg" }],
      [102, "debug", "sync", "noise", null],
    ]);

    const warnings = fetchSessionLogs(store.db, id, { minLevel: "warn" });
    expect(warnings.map((r) => r.message)).toEqual(["hash computation failed"]);

    const newest = fetchSessionLogs(store.db, id, { order: "desc", limit: 1 });
    expect(newest.map((r) => r.message)).toEqual(["noise"]);

    expect(renderLogRows(warnings, { json: false, absolute: true })).toEqual([
      `(${new Date(101).toISOString()}) WARN [sync.pipeline] hash computation failed {"path":"/src/x.jpg"}`,
    ]);
    store.close();
  });

  test("detach stops writing", () => {
    const store = memoryStore();
    const deferred = new DeferredSessionSink();
    const logger = new StructuredLogger({ sink: deferred.sink });
    const id = store.startSession("/src", "/dest");
    deferred.attach(store.db, id);
    logger.info("kept");
    deferred.detach();
    logger.info("buffered");
    expect(fetchSessionLogs(store.db, id).map((r) => r.message)).toEqual(["kept"]);
    expect(deferred.pendingCount).toBe(1);
    store.close();
  });
});
