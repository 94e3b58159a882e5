import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { DuplicateRegistry } from "../duplicate-registry.js";
import { CopyError, InterruptSignal } from "../errors.js";
import { hashLocal } from "../hash.js";
import { SyncReport } from "../report.js";
import type { SqliteSessionStore } from "../session-store.js";
import { HASH_FAILED_REASON, TransferPipeline } from "../transfer-pipeline.js";
import { FakeTransport, memoryStore, writeFile } from "./util.js";

describe("TransferPipeline", () => {
  let tmp: string;
  let src: string;
  let store: SqliteSessionStore;
  let sessionId: number;
  let transport: FakeTransport;
  let registry: DuplicateRegistry;
  let report: SyncReport;

  const pipeline = (opts: { simulate?: boolean; signal?: AbortSignal } = {}) =>
    new TransferPipeline({
      sessionId,
      sourceRoot: src,
      destRoot: "/srv/media",
      transport,
      store,
      registry,
      report,
      hashAlg: "md5",
      ...opts,
    });

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(join(os.tmpdir(), "mediasync-pipeline-"));
    src = join(tmp, "src");
    await writeFile(src, "a.jpg", "alpha");
    await writeFile(src, "trip/b.jpg", "bravo");
    await writeFile(src, "photos/y.jpg", "same as x");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  beforeEach(() => {
    store = memoryStore();
    sessionId = store.startSession(src, "/srv/media");
    transport = new FakeTransport();
    registry = new DuplicateRegistry();
    report = new SyncReport();
  });

  afterEach(() => {
    store.close();
  });

  test("new file: mkdir parent, copy, record, register", async () => {
    // test -d fails, so the parent gets created
    transport.runImpl = (cmd) => ({
      exitStatus: cmd.startsWith("test -d") ? 1 : 0,
      stdout: "",
      stderr: "",
    });
    const local = join(src, "trip/b.jpg");
    const out = await pipeline().processFile(local);
    const hash = await hashLocal("md5", local);
    expect(out).toEqual({
      kind: "transferred",
      localPath: local,
      destPath: "/srv/media/trip/b.jpg",
      hash,
      size: 5,
    });
    expect(transport.commands).toEqual([
      "test -d '/srv/media/trip'",
      "mkdir -p -- '/srv/media/trip'",
    ]);
    expect(transport.copies).toEqual([[local, "/srv/media/trip/b.jpg"]]);
    expect(registry.canonicalPath(hash)).toBe("/srv/media/trip/b.jpg");
    expect(report.toCounters()).toMatchObject({ filesTransferred: 1, totalBytes: 5 });
    expect(store.transfers(sessionId).map((t) => [t.dest_file, t.status, t.is_duplicate])).toEqual([
      ["/srv/media/trip/b.jpg", "COMPLETED", 0],
    ]);
  });

  test("parent directories are checked once per run", async () => {
    const p = pipeline();
    await p.processFile(join(src, "a.jpg"));
    await writeFile(src, "a2.jpg", "another");
    await p.processFile(join(src, "a2.jpg"));
    expect(transport.commands).toEqual(["test -d '/srv/media'"]);
  });

  test("duplicate content gets the first free _DUP name", async () => {
    const local = join(src, "photos/y.jpg");
    const hash = await hashLocal("md5", local);
    registry.registerRemote(hash, "/srv/media/photos/2020/x.jpg");
    transport.existing.add("/srv/media/photos/y_DUP.jpg");

    const out = await pipeline().processFile(local);
    expect(out).toMatchObject({
      kind: "duplicate",
      destPath: "/srv/media/photos/y_DUP2.jpg",
      canonicalPath: "/srv/media/photos/2020/x.jpg",
    });
    expect(registry.canonicalPath(hash)).toBe("/srv/media/photos/2020/x.jpg");
    expect(report.toCounters()).toMatchObject({
      filesTransferred: 0,
      duplicatesFound: 1,
      duplicatesRenamed: 1,
      totalBytes: 0,
    });
    expect(store.transfers(sessionId)[0]).toMatchObject({
      dest_file: "/srv/media/photos/y_DUP2.jpg",
      is_duplicate: 1,
      status: "COMPLETED",
    });
  });

  test("simulated: same decisions, no remote calls", async () => {
    const local = join(src, "photos/y.jpg");
    const hash = await hashLocal("md5", local);
    registry.registerRemote(hash, "/srv/media/photos/2020/x.jpg");
    transport.existing.add("/srv/media/photos/y_DUP.jpg");

    const out = await pipeline({ simulate: true }).processFile(local);
    expect(out).toMatchObject({ kind: "duplicate", destPath: "/srv/media/photos/y_DUP.jpg" });
    expect(transport.commands).toEqual([]);
    expect(transport.copies).toEqual([]);
    expect(store.transfers(sessionId)[0]?.status).toBe("DRY_RUN");
  });

  test("already processed by path needs no hashing", async () => {
    const local = join(src, "a.jpg");
    registry.addProcessedPaths([local]);
    const out = await pipeline().processFile(local);
    expect(out).toEqual({ kind: "already-processed", localPath: local });
    expect(report.alreadyProcessed).toBe(1);
    expect(transport.commands).toEqual([]);
  });

  test("already processed by content delivered from another path", async () => {
    const local = join(src, "a.jpg");
    const hash = await hashLocal("md5", local);
    registry.loadProcessed(new Map([[join(src, "old/a.jpg"), hash]]));
    const out = await pipeline().processFile(local);
    expect(out).toEqual({ kind: "already-processed", localPath: local, hash });
    expect(transport.copies).toEqual([]);
  });

  test("hash failure is a failed outcome, not an exception", async () => {
    const local = join(src, "vanished.jpg");
    const out = await pipeline().processFile(local);
    expect(out).toEqual({ kind: "failed", localPath: local, reason: HASH_FAILED_REASON, hash: undefined });
    expect(report.toCounters()).toMatchObject({ errors: 1, skipped: 1 });
    expect(report.errors).toEqual([`${HASH_FAILED_REASON}: ${local}`]);
    expect(store.sessionDetail(sessionId)?.errors.map((e) => [e.message, e.file_path])).toEqual([
      [HASH_FAILED_REASON, local],
    ]);
  });

  test("mkdir failure fails the file", async () => {
    transport.runImpl = () => ({ exitStatus: 1, stdout: "", stderr: "read-only" });
    const out = await pipeline().processFile(join(src, "trip/b.jpg"));
    expect(out).toMatchObject({ kind: "failed", reason: "cannot create directory /srv/media/trip" });
    expect(transport.copies).toEqual([]);
    expect(report.skipped).toBe(1);
  });

  test("copy failure is recorded and the registry is untouched", async () => {
    transport.copyImpl = async () => {
      throw new CopyError("rsync exited 23");
    };
    const local = join(src, "a.jpg");
    const out = await pipeline().processFile(local);
    expect(out).toMatchObject({ kind: "failed", reason: "transfer failed: rsync exited 23" });
    expect(registry.remoteCount).toBe(0);
    expect(report.toCounters()).toMatchObject({ filesTransferred: 0, errors: 1, skipped: 1 });
    expect(store.transfers(sessionId)).toEqual([]);
  });

  test("abort mid-file leaves an INTERRUPTED record and throws", async () => {
    const ctl = new AbortController();
    transport.copyImpl = async () => {
      ctl.abort();
      throw new Error("killed");
    };
    const local = join(src, "a.jpg");
    await expect(pipeline({ signal: ctl.signal }).processFile(local)).rejects.toBeInstanceOf(
      InterruptSignal,
    );
    const rows = store.transfers(sessionId);
    expect(rows.map((r) => [r.source_file, r.dest_file, r.status])).toEqual([
      [local, "/srv/media/a.jpg", "INTERRUPTED"],
    ]);
    expect(registry.remoteCount).toBe(0);
    expect(report.filesTransferred).toBe(0);
  });
});
