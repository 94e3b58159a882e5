import ignore from "ignore";

export type Ignorer = {
  ignoresFile: (r: string) => boolean; // path relative to the source root
  ignoresDir: (r: string) => boolean;
};

export function normalizeR(r: string): string {
  // rpath normalization; keep empty "" for root-safe callers
  return r.replace(/\\/g, "/").replace(/^\/+/, "");
}

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

/** commander collector for repeatable, comma separated list options. */
export function collectListOption(value: string, previous: string[] = []): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

// gitignore semantics; a trailing "/" pattern only matches directories
export function createIgnorer(patterns: readonly string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return {
      ignoresFile: () => false,
      ignoresDir: () => false,
    };
  }
  const matcher = ignore().add(cleaned);
  return {
    ignoresFile: (r) => {
      const n = normalizeR(r);
      return n !== "" && matcher.ignores(n);
    },
    ignoresDir: (r) => {
      const n = normalizeR(r);
      return n !== "" && matcher.ignores(n.endsWith("/") ? n : `${n}/`);
    },
  };
}
