// src/dest-path.ts
import path from "node:path";
import { DUPLICATE_MARKER } from "./constants.js";

/**
 * Map a local file onto the destination tree, keeping its position relative
 * to the source root. Files outside the root land directly under destRoot.
 * Destination paths are always posix.
 */
export function destinationFor(
  localPath: string,
  sourceRoot: string,
  destRoot: string,
): string {
  const rel = path.relative(path.resolve(sourceRoot), path.resolve(localPath));
  const inside = rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
  const relPosix = inside
    ? rel.split(path.sep).join("/")
    : path.basename(localPath);
  return path.posix.join(destRoot, relPosix);
}

/**
 * n-th disambiguated name for a duplicate: n=1 -> stem_DUP.ext,
 * n=2 -> stem_DUP2.ext, ...
 */
export function duplicateCandidate(destPath: string, n: number): string {
  const { dir, name, ext } = path.posix.parse(destPath);
  const suffix = `${DUPLICATE_MARKER}${n > 1 ? n : ""}`;
  return path.posix.join(dir, `${name}${suffix}${ext}`);
}

/**
 * First candidate name for which `isTaken` answers false. With no check
 * (simulated runs) the first candidate is accepted.
 */
export async function pickDuplicateName(
  destPath: string,
  isTaken?: (candidate: string) => Promise<boolean>,
): Promise<string> {
  for (let n = 1; ; n++) {
    const candidate = duplicateCandidate(destPath, n);
    if (!isTaken || !(await isTaken(candidate))) return candidate;
  }
}
