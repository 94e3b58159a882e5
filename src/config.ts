// src/config.ts
//
// Where mediasync keeps its data, how endpoints are written on the command
// line, and the validated shape of a `sync` invocation.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CLI_NAME, DEFAULT_DB_FILE, DEFAULT_MEDIA_EXTENSIONS } from "./constants.js";
import { MediaSyncError } from "./errors.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { normalizeIgnorePatterns } from "./ignore.js";
import { errorMessage, parseLogLevel, type LogLevel } from "./logger.js";
import { parseOwner } from "./post-process.js";
import { normalizeExtensions } from "./scan-local.js";

type Env = Record<string, string | undefined>;

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** Data directory; not created here. */
export function getMediaSyncHome(env: Env = process.env): string {
  const explicit = env.MEDIASYNC_HOME?.trim();
  if (explicit) return path.resolve(expandHome(explicit));

  const xdg = env.XDG_DATA_HOME?.trim();
  if (xdg) return path.join(expandHome(xdg), CLI_NAME);

  const home = os.homedir();
  if (process.platform === "darwin") {
    return path.join(home, "Library", "Application Support", CLI_NAME);
  }
  if (process.platform === "win32") {
    const appData = env.APPDATA || path.join(home, "AppData", "Roaming");
    return path.join(appData, CLI_NAME);
  }
  return path.join(home, ".local", "share", CLI_NAME);
}

export function defaultDbPath(env: Env = process.env): string {
  return path.join(getMediaSyncHome(env), DEFAULT_DB_FILE);
}

export function envLogLevel(env: Env = process.env): LogLevel {
  return parseLogLevel(env.MEDIASYNC_LOG_LEVEL, "info");
}

export const DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS = 15;

export function sshConnectTimeout(env: Env = process.env): number {
  const raw = env.MEDIASYNC_SSH_CONNECT_TIMEOUT?.trim();
  if (!raw) return DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : DEFAULT_SSH_CONNECT_TIMEOUT_SECONDS;
}

export type Endpoint = {
  root: string;
  host?: string;
  user?: string;
  port?: number;
};

export function parsePort(raw: string): number {
  if (!/^\d+$/.test(raw)) throw new Error(`Invalid SSH port '${raw}'`);
  const port = Number(raw);
  if (port < 1 || port > 65535) throw new Error(`Invalid SSH port '${raw}'`);
  return port;
}

// Endpoint forms:
//   /abs/path, ~/path, ./rel          local
//   [user@]host:/path                 ssh, default port
//   [user@]host:2222:/path            ssh, explicit port ("host::/path" = 22)
export function parseEndpoint(input: string): Endpoint {
  const trimmed = input.trim();
  if (!trimmed) throw new Error("empty destination");
  if (
    trimmed.startsWith("/") ||
    trimmed.startsWith("~/") ||
    trimmed === "~" ||
    trimmed.startsWith("./") ||
    trimmed.startsWith("../")
  ) {
    return { root: trimmed };
  }

  const match = /^(?:([^@:/]+)@)?([^:@/]+)(?::(\d*))?:(.*)$/.exec(trimmed);
  if (!match) return { root: trimmed };
  const [, user, host, portPart, root] = match;

  if (!root || (root[0] !== "/" && root !== "~" && !root.startsWith("~/"))) {
    throw new Error(`Remote paths must start with '/' or '~/' (got '${root ?? ""}')`);
  }
  const ep: Endpoint = { host, root };
  if (user) ep.user = user;
  if (portPart !== undefined) ep.port = portPart === "" ? 22 : parsePort(portPart);
  return ep;
}

/** Inverse of parseEndpoint; what the store records as the destination. */
export function formatEndpoint({ host, user, port, root }: Endpoint): string {
  if (!host) return root;
  const who = user ? `${user}@${host}` : host;
  return port != null ? `${who}:${port}:${root}` : `${who}:${root}`;
}

/** Raw `sync` options as commander hands them over. */
export interface SyncCliOptions {
  source?: string;
  dest?: string;
  host?: string;
  user?: string;
  port?: string;
  identity?: string;
  interactiveAuth?: boolean;
  ext?: string[];
  ignore?: string[];
  hash?: string;
  dryRun?: boolean;
  resume?: string;
  forceNew?: boolean;
  yes?: boolean;
  owner?: string;
  rescanCmd?: string;
  postProcess?: boolean;
}

export interface SyncConfig {
  source: string;
  dest: Endpoint;
  /** formatEndpoint(dest), the store's key for the destination. */
  destKey: string;
  identityFile?: string;
  interactiveAuth: boolean;
  connectTimeoutSeconds: number;
  extensions: string[];
  ignore: string[];
  hashAlg: HashAlg;
  dryRun: boolean;
  resumeId?: number;
  forceNew: boolean;
  assumeYes: boolean;
  owner?: string;
  rescanCommand?: string;
  postProcess: boolean;
}

export class ConfigError extends MediaSyncError {
  constructor(readonly problems: string[]) {
    super(`invalid sync options:\n  - ${problems.join("\n  - ")}`, { problems });
    this.name = "ConfigError";
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Validate and normalize `sync` options. Collects every problem before
 * throwing a single ConfigError.
 */
export function resolveSyncConfig(
  raw: SyncCliOptions,
  env: Env = process.env,
): SyncConfig {
  const problems: string[] = [];

  let source = "";
  if (!raw.source?.trim()) {
    problems.push("--source is required");
  } else {
    source = path.resolve(expandHome(raw.source.trim()));
    if (!isDirectory(source)) problems.push(`source ${source} is not a directory`);
  }

  let dest: Endpoint = { root: "" };
  if (!raw.dest?.trim()) {
    problems.push("--dest is required");
  } else {
    try {
      dest = parseEndpoint(raw.dest);
    } catch (err) {
      problems.push(errorMessage(err));
    }
  }
  if (raw.host?.trim()) {
    if (dest.host && dest.host !== raw.host.trim()) {
      problems.push(`--host ${raw.host} conflicts with destination host ${dest.host}`);
    }
    dest.host = raw.host.trim();
  }
  if (raw.user?.trim()) dest.user = raw.user.trim();
  if (raw.port != null) {
    try {
      dest.port = parsePort(raw.port.trim());
    } catch (err) {
      problems.push(errorMessage(err));
    }
  }
  if (dest.host && dest.root && !dest.root.startsWith("/") && !dest.root.startsWith("~")) {
    problems.push(`remote destination must be absolute or start with ~ (got '${dest.root}')`);
  }
  if (!dest.host && dest.root) {
    dest.root = path.resolve(expandHome(dest.root));
    if (dest.user || dest.port != null) {
      problems.push("--user/--port need a remote destination host");
    }
  }

  let identityFile: string | undefined;
  if (raw.identity?.trim()) {
    identityFile = path.resolve(expandHome(raw.identity.trim()));
    try {
      fs.accessSync(identityFile, fs.constants.R_OK);
    } catch {
      problems.push(`identity file ${identityFile} is not readable`);
    }
  }

  const extensions = normalizeExtensions(
    raw.ext?.length ? raw.ext : DEFAULT_MEDIA_EXTENSIONS,
  );
  if (!extensions.length) problems.push("extension list is empty");
  for (const ext of extensions) {
    if (!/^\.[a-z0-9]+$/.test(ext)) problems.push(`invalid extension '${ext}'`);
  }

  let hashAlg: HashAlg = normalizeHashAlg();
  try {
    hashAlg = normalizeHashAlg(raw.hash);
  } catch (err) {
    problems.push(errorMessage(err));
  }

  let resumeId: number | undefined;
  if (raw.resume != null) {
    const n = Number(raw.resume);
    if (!Number.isInteger(n) || n < 1) {
      problems.push(`--resume expects a session id (got '${raw.resume}')`);
    } else {
      resumeId = n;
    }
  }
  if (resumeId != null && raw.forceNew) {
    problems.push("--resume and --force-new are mutually exclusive");
  }

  if (raw.owner) {
    try {
      parseOwner(raw.owner);
    } catch (err) {
      problems.push(errorMessage(err));
    }
  }

  if (problems.length) throw new ConfigError(problems);

  return {
    source,
    dest,
    destKey: formatEndpoint(dest),
    identityFile,
    interactiveAuth: raw.interactiveAuth ?? false,
    connectTimeoutSeconds: sshConnectTimeout(env),
    extensions,
    ignore: normalizeIgnorePatterns(raw.ignore ?? []),
    hashAlg,
    dryRun: raw.dryRun ?? false,
    resumeId,
    forceNew: raw.forceNew ?? false,
    assumeYes: raw.yes ?? false,
    owner: raw.owner,
    rescanCommand: raw.rescanCmd,
    postProcess: raw.postProcess ?? true,
  };
}
