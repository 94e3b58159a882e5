// src/hash.ts
import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import fs from "node:fs/promises";
import { createHash, getHashes } from "node:crypto";
import { HashError } from "./errors.js";
import { errorMessage } from "./logger.js";
import { hashCommand, type RemoteTransport } from "./remote.js";

export const HASH_STREAM_CUTOFF = 10_000_000; // ~10MB; small files do one-shot hashing
export const STREAM_HWM = 8 * 1024 * 1024; // 8MB read chunks

// Hex digests so local values compare equal to `<alg>sum` output on the host.
const ENCODING = "hex";

// Each of these has a coreutils `<alg>sum` counterpart on the remote side.
export const CURATED_HASH_ALGOS = ["md5", "sha1", "sha256", "sha512"] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "md5";
}

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/**
 * Normalize/validate requested algorithm against runtime support.
 * Accepts "md5sum"-style names as well.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  if (!requested) return defaultHashAlg();
  const list = listSupportedHashes();
  const low = requested.trim().toLowerCase().replace(/sum$/, "");
  const exact = list.find((h) => h === low);
  if (exact) return exact;
  throw new Error(
    `Unknown/unsupported hash algorithm "${requested}". Try one of:\n  ${list.join(", ")}`,
  );
}

/**
 * Hash a local file. Small files are read at once, larger ones are streamed
 * in STREAM_HWM chunks with backpressure.
 */
export async function fileDigest(
  alg: HashAlg,
  path: string,
  size?: number,
): Promise<string> {
  let n = size;
  if (n == null) {
    const st = await fs.stat(path);
    n = st.size;
  }

  if (n <= HASH_STREAM_CUTOFF) {
    const buf = await fs.readFile(path);
    return createHash(alg).update(buf).digest(ENCODING);
  }

  const h = createHash(alg);
  const rs = createReadStream(path, { highWaterMark: STREAM_HWM });

  await pipeline(rs, async (src: AsyncIterable<Buffer>) => {
    for await (const chunk of src) h.update(chunk);
  });

  return h.digest(ENCODING);
}

export async function hashLocal(
  alg: HashAlg,
  path: string,
  size?: number,
): Promise<string> {
  try {
    return await fileDigest(alg, path, size);
  } catch (err) {
    throw new HashError(`cannot hash ${path}: ${errorMessage(err)}`, {
      path,
      alg,
    });
  }
}

const DIGEST_RE = /^[0-9a-f]+$/;

/**
 * Hash a file on the far side of the transport with `<alg>sum` and take the
 * first token of its output.
 */
export async function hashRemote(
  transport: RemoteTransport,
  alg: HashAlg,
  remotePath: string,
  timeoutMs?: number,
): Promise<string> {
  const { exitStatus, stdout, stderr } = await transport.run(
    hashCommand(alg, remotePath),
    timeoutMs,
  );
  const err = stderr.trim();
  if (exitStatus !== 0 || err) {
    throw new HashError(
      `remote ${alg}sum failed for ${remotePath}: ${err || `exit ${exitStatus}`}`,
      { path: remotePath, exitStatus },
    );
  }
  // md5sum escapes names containing '\' by prefixing the digest with '\'
  const token = stdout.trim().split(/\s+/)[0]?.replace(/^\\/, "") ?? "";
  if (!token || !DIGEST_RE.test(token.toLowerCase())) {
    throw new HashError(`remote ${alg}sum returned no digest for ${remotePath}`, {
      path: remotePath,
    });
  }
  return token.toLowerCase();
}
