import {
  collectExcludeOption,
  copyFilterArgs,
  createExcluder,
  deserializeExcludePatterns,
  normalizeExcludePatterns,
  normalizeRel,
  serializeExcludePatterns,
  splitPatternList,
} from "../ignore.js";

describe("exclude patterns", () => {
  it("normalizes and dedupes patterns", () => {
    expect(normalizeExcludePatterns([" *.log ", "", "a\\b", "*.log"])).toEqual([
      "*.log",
      "a/b",
    ]);
  });

  it("round-trips through the stored JSON form", () => {
    const raw = serializeExcludePatterns(["node_modules/", "*.tmp"]);
    expect(raw).toBe('["node_modules/","*.tmp"]');
    expect(deserializeExcludePatterns(raw)).toEqual(["node_modules/", "*.tmp"]);
  });

  it("treats garbage in the stored form as no patterns", () => {
    expect(deserializeExcludePatterns(null)).toEqual([]);
    expect(deserializeExcludePatterns("not json")).toEqual([]);
    expect(deserializeExcludePatterns('{"a":1}')).toEqual([]);
    expect(deserializeExcludePatterns('["ok", 3]')).toEqual(["ok"]);
  });

  it("splits comma lists and accumulates repeated options", () => {
    expect(splitPatternList("a, b,,c ")).toEqual(["a", "b", "c"]);
    expect(collectExcludeOption("c", collectExcludeOption("a,b"))).toEqual([
      "a",
      "b",
      "c",
    ]);
  });

  it("normalizes relative paths", () => {
    expect(normalizeRel("./a\\b")).toBe("a/b");
    expect(normalizeRel("/x/y")).toBe("x/y");
  });
});

describe("createExcluder", () => {
  it("excludes nothing without patterns", () => {
    const ex = createExcluder();
    expect(ex.patterns).toEqual([]);
    expect(ex.excludes("anything", false)).toBe(false);
  });

  it("uses gitignore matching", () => {
    const ex = createExcluder(["*.log", "build/", "!keep.log"]);
    expect(ex.excludes("debug.log", false)).toBe(true);
    expect(ex.excludes("sub/debug.log", false)).toBe(true);
    expect(ex.excludes("keep.log", false)).toBe(false);
    expect(ex.excludes("build", true)).toBe(true);
    expect(ex.excludes("build", false)).toBe(false);
    expect(ex.excludes("src/main.ts", false)).toBe(false);
  });

  it("never excludes the root itself", () => {
    expect(createExcluder(["*"]).excludes("", true)).toBe(false);
  });
});

describe("copyFilterArgs", () => {
  it("gives file items no rules", () => {
    expect(copyFilterArgs("a.log", false, ["*.log"])).toEqual([]);
  });

  it("passes basename patterns through", () => {
    expect(copyFilterArgs("src", true, ["*.log", "cache/"])).toEqual([
      "--exclude",
      "cache/",
      "--exclude",
      "*.log",
    ]);
  });

  it("drops root-anchored patterns that name other items or the item itself", () => {
    expect(copyFilterArgs("a", true, ["/build", "b/raw", "/a"])).toEqual([]);
  });

  it("strips the item prefix from patterns below it", () => {
    expect(copyFilterArgs("a", true, ["a/raw", "/a/tmp/"])).toEqual([
      "--exclude",
      "/tmp/",
      "--exclude",
      "/raw",
    ]);
  });

  it("matches a glob first segment against the item name", () => {
    expect(copyFilterArgs("data1", true, ["data*/cache"])).toEqual([
      "--exclude",
      "/cache",
    ]);
    expect(copyFilterArgs("logs", true, ["data*/cache"])).toEqual([]);
  });

  it("expands double-star prefixes to every depth", () => {
    expect(copyFilterArgs("a", true, ["**/tmp/x", "a/**/y"])).toEqual([
      "--exclude",
      "/**/y",
      "--exclude",
      "/y",
      "--exclude",
      "/**/tmp/x",
      "--exclude",
      "/tmp/x",
    ]);
  });

  it("keeps last-match-wins order for negations", () => {
    expect(copyFilterArgs("a", true, ["*.log", "!keep.log"])).toEqual([
      "--include",
      "keep.log",
      "--exclude",
      "*.log",
    ]);
  });
});
