import ignore from "ignore";

// Exclude patterns use gitignore syntax relative to the job's source root.
// The scanner matches them directly; copyFilterArgs rewrites them into rsync
// filter rules relative to one item, so both agree on what gets copied.

export type Excluder = {
  excludes: (rel: string, isDirectory: boolean) => boolean;
  patterns: string[];
};

export function normalizeRel(r: string): string {
  return r.replace(/\\/g, "/").replace(/^\.\/+/, "").replace(/^\/+/, "");
}

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeExcludePatterns(patterns: Iterable<string>): string[] {
  const out = new Set<string>();
  for (const raw of patterns ?? []) {
    if (typeof raw !== "string") continue;
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function splitPatternList(value: string): string[] {
  return value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}

export function serializeExcludePatterns(patterns: Iterable<string>): string {
  return JSON.stringify(normalizeExcludePatterns(patterns));
}

export function deserializeExcludePatterns(raw?: string | null): string[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return normalizeExcludePatterns(
    parsed.filter((p): p is string => typeof p === "string"),
  );
}

// commander accumulator for repeatable `--exclude a,b --exclude c`
export function collectExcludeOption(
  value: string,
  previous: string[] = [],
): string[] {
  return [...previous, ...splitPatternList(value)];
}

export function createExcluder(patterns: Iterable<string> = []): Excluder {
  const cleaned = normalizeExcludePatterns(patterns);
  if (!cleaned.length) {
    return { excludes: () => false, patterns: cleaned };
  }
  const ig = ignore().add(cleaned);
  return {
    patterns: cleaned,
    excludes: (rel, isDirectory) => {
      const r = normalizeRel(rel);
      if (!r) return false;
      return ig.ignores(isDirectory ? `${r}/` : r);
    },
  };
}

function anchoredRules(rest: string): string[] {
  // "**/" may match no directories at all in gitignore, never in rsync
  if (rest.startsWith("**/")) return [`/${rest.slice(3)}`, `/${rest}`];
  return [`/${rest}`];
}

function segmentMatches(segment: string, name: string): boolean {
  if (!/[*?[\\]/.test(segment)) return segment === name;
  return ignore().add(segment).ignores(name);
}

/**
 * rsync filter arguments that reproduce `patterns` inside one top-level item.
 * The copy tool's transfer root is the item's own directory and it stops at
 * the first matching rule, so patterns are re-anchored to the item and
 * emitted last-to-first. A file item gets none: the scanner already decided
 * it is copied.
 */
export function copyFilterArgs(
  itemPath: string,
  isDirectory: boolean,
  patterns: Iterable<string>,
): string[] {
  if (!isDirectory) return [];
  const item = normalizeRel(itemPath);
  const rules: [string, string][] = [];
  for (const raw of normalizeExcludePatterns(patterns)) {
    if (raw.startsWith("#")) continue;
    const negated = raw.startsWith("!");
    const flag = negated ? "--include" : "--exclude";
    const pattern = negated ? raw.slice(1) : raw;
    const body = pattern.replace(/\/+$/, "");
    const dirOnly = body !== pattern ? "/" : "";
    if (!body) continue;
    if (!body.includes("/")) {
      // basename patterns match at any depth on both sides
      rules.push([flag, pattern]);
      continue;
    }
    const segments = body.replace(/^\/+/, "").split("/");
    const [first, ...restSegments] = segments;
    if (first === "**") {
      const rest = restSegments.join("/");
      if (rest) {
        for (const r of anchoredRules(`**/${rest}`)) rules.push([flag, r + dirOnly]);
      }
      continue;
    }
    // anchored at the source root: only relevant below a matching item
    if (!restSegments.length || !segmentMatches(first, item)) continue;
    for (const r of anchoredRules(restSegments.join("/"))) {
      rules.push([flag, r + dirOnly]);
    }
  }
  const args: string[] = [];
  for (const [flag, rule] of rules.reverse()) args.push(flag, rule);
  return args;
}
