// src/scan-local.ts
import * as walk from "@nodelib/fs.walk";
import path from "node:path";
import { createIgnorer } from "./ignore.js";
import type { Logger } from "./logger.js";

export function normalizeExtensions(exts: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of exts) {
    const trimmed = raw.trim().toLowerCase();
    if (!trimmed) continue;
    out.add(trimmed.startsWith(".") ? trimmed : `.${trimmed}`);
  }
  return Array.from(out);
}

export function hasMediaExtension(file: string, extensions: readonly string[]): boolean {
  const lower = file.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
}

export interface LocalScanOptions {
  root: string;
  extensions: readonly string[];
  ignore?: readonly string[];
  logger?: Logger;
}

/**
 * Every regular file under root whose name carries one of the extensions,
 * absolute paths in sorted order so runs process files deterministically.
 * Symlinks are not followed.
 */
export async function listLocalMediaFiles({
  root,
  extensions,
  ignore = [],
  logger,
}: LocalScanOptions): Promise<string[]> {
  const absRoot = path.resolve(root);
  const exts = normalizeExtensions(extensions);
  const ig = createIgnorer(ignore);
  const rel = (p: string) => path.relative(absRoot, p).split(path.sep).join("/");

  const entries = await new Promise<walk.Entry[]>((resolve, reject) => {
    walk.walk(
      absRoot,
      {
        followSymbolicLinks: false,
        deepFilter: (e) => !ig.ignoresDir(rel(e.path)),
        entryFilter: (e) =>
          e.dirent.isFile() &&
          hasMediaExtension(e.name, exts) &&
          !ig.ignoresFile(rel(e.path)),
        errorFilter: (err) => {
          logger?.warn("skipping unreadable entry", { error: err.message });
          return true;
        },
      },
      (err, found) => (err ? reject(err) : resolve(found)),
    );
  });
  const files = entries.map((e) => e.path);
  files.sort();
  logger?.info("local media files found", { root: absRoot, count: files.length });
  return files;
}
