import fsp from "node:fs/promises";
import { dirname, join, relative } from "node:path";
import { getDb } from "../db.js";
import type { RemoteTransport, RunResult } from "../remote.js";
import { SqliteSessionStore } from "../session-store.js";

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export type Roots = {
  src: string;
  dest: string;
};

export async function mkCase(tmpBase: string, name: string): Promise<Roots> {
  const base = join(tmpBase, name);
  const src = join(base, "src");
  const dest = join(base, "dest");
  await fsp.mkdir(src, { recursive: true });
  await fsp.mkdir(dest, { recursive: true });
  return { src, dest };
}

export async function writeFile(root: string, rel: string, content: string | Buffer) {
  const p = join(root, rel);
  await fsp.mkdir(dirname(p), { recursive: true });
  await fsp.writeFile(p, content);
  return p;
}

/** Every file under root, relative and sorted. */
export async function listTree(root: string): Promise<string[]> {
  const out: string[] = [];
  const walk = async (dir: string) => {
    for (const d of await fsp.readdir(dir, { withFileTypes: true })) {
      const p = join(dir, d.name);
      if (d.isDirectory()) await walk(p);
      else out.push(relative(root, p));
    }
  };
  await walk(root);
  return out.sort();
}

export function memoryStore(clock?: () => number): SqliteSessionStore {
  return new SqliteSessionStore(getDb(":memory:"), clock);
}

const OK: RunResult = { exitStatus: 0, stdout: "", stderr: "" };

/**
 * In-memory stand-in for a remote host: records commands and copies, answers
 * exists() from a set of paths.
 */
export class FakeTransport implements RemoteTransport {
  readonly label = "fake";
  connected = false;
  connectError?: Error;
  readonly commands: string[] = [];
  readonly copies: [string, string][] = [];
  readonly existing = new Set<string>();
  runImpl: (command: string) => RunResult = () => OK;
  copyImpl?: (localPath: string, remotePath: string) => Promise<void>;

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async run(command: string): Promise<RunResult> {
    this.commands.push(command);
    return this.runImpl(command);
  }

  async copy(localPath: string, remotePath: string): Promise<void> {
    this.copies.push([localPath, remotePath]);
    if (this.copyImpl) await this.copyImpl(localPath, remotePath);
    this.existing.add(remotePath);
  }

  async exists(remotePath: string): Promise<boolean> {
    return this.existing.has(remotePath);
  }
}
