// src/preflight.ts
import fsp from "node:fs/promises";
import { errorMessage, NullLogger, type Logger } from "./logger.js";
import {
  dirExistsCommand,
  expandRemoteHome,
  writableCommand,
  type RemoteTransport,
} from "./remote.js";

export type PreflightCheckName =
  | "source directory"
  | "connection"
  | "destination exists"
  | "destination writable";

export interface PreflightCheck {
  name: PreflightCheckName;
  ok: boolean;
  detail: string;
}

export interface PreflightResult {
  checks: PreflightCheck[];
  /** False when the source or the connection check failed. */
  canProceed: boolean;
  /** Destination with a leading ~ expanded on the far side. */
  destRoot: string;
}

const BLOCKING: readonly PreflightCheckName[] = ["source directory", "connection"];

/**
 * Checks a dry run performs before opening its session. Leaves the
 * transport connected on success; the caller owns disconnecting it.
 */
export async function preflight(
  transport: RemoteTransport,
  source: string,
  dest: string,
  logger: Logger = new NullLogger(),
): Promise<PreflightResult> {
  const log = logger.child("preflight");
  const checks: PreflightCheck[] = [];
  const record = (name: PreflightCheckName, ok: boolean, detail: string) => {
    checks.push({ name, ok, detail });
    if (ok) log.info(`${name}: ok`, { detail });
    else if (BLOCKING.includes(name)) log.error(`${name}: failed`, { detail });
    else log.warn(`${name}: failed`, { detail });
  };
  let destRoot = dest;
  const done = (): PreflightResult => ({
    checks,
    destRoot,
    canProceed: BLOCKING.every((name) =>
      checks.some((c) => c.name === name && c.ok),
    ),
  });

  try {
    const st = await fsp.stat(source);
    record("source directory", st.isDirectory(), st.isDirectory() ? source : `${source} is not a directory`);
  } catch (err) {
    record("source directory", false, errorMessage(err));
  }
  if (!checks[0]?.ok) return done();

  try {
    await transport.connect();
    record("connection", true, transport.label);
  } catch (err) {
    record("connection", false, errorMessage(err));
    return done();
  }

  try {
    destRoot = await expandRemoteHome(transport, dest);
  } catch (err) {
    record("destination exists", false, errorMessage(err));
    return done();
  }
  const exists = await transport.run(dirExistsCommand(destRoot));
  record(
    "destination exists",
    exists.exitStatus === 0,
    exists.exitStatus === 0 ? destRoot : `${destRoot} not found`,
  );
  const writable = await transport.run(writableCommand(destRoot));
  record(
    "destination writable",
    writable.exitStatus === 0,
    writable.exitStatus === 0 ? destRoot : `${destRoot} is not writable`,
  );
  return done();
}
