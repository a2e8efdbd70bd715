// filename-issues.ts
//
// Names that copy fine between POSIX trees but break on the SMB/FAT/NTFS
// backed mounts lanecopy usually writes to. The scanner reports them; they do
// not stop a job.

import path from "node:path";

export const MAX_NAME_BYTES = 255;

export type FilenameIssueType =
  | "backslash"
  | "colon"
  | "asterisk"
  | "question_mark"
  | "double_quote"
  | "less_than"
  | "greater_than"
  | "pipe"
  | "null_byte"
  | "control_char"
  | "leading_space"
  | "trailing_space"
  | "trailing_dot"
  | "too_long";

export const FILENAME_ISSUE_TYPES: readonly FilenameIssueType[] = [
  "backslash",
  "colon",
  "asterisk",
  "question_mark",
  "double_quote",
  "less_than",
  "greater_than",
  "pipe",
  "null_byte",
  "control_char",
  "leading_space",
  "trailing_space",
  "trailing_dot",
  "too_long",
];

// checked in this order; the first hit names the issue
const RESERVED_CHARS: readonly [string, FilenameIssueType, string][] = [
  ["\\", "backslash", "-"],
  [":", "colon", "-"],
  ["*", "asterisk", "_"],
  ["?", "question_mark", "_"],
  ['"', "double_quote", "'"],
  ["<", "less_than", "("],
  [">", "greater_than", ")"],
  ["|", "pipe", "-"],
  ["\x00", "null_byte", ""],
];

export interface NameCheck {
  type: FilenameIssueType;
  char: string | null;
}

export interface FilenameIssue extends NameCheck {
  // path relative to the scanned root, "/"-separated
  relativePath: string;
  name: string;
  isDirectory: boolean;
  // null when no safe rename exists
  suggestedName: string | null;
}

function byteLength(s: string): number {
  return Buffer.byteLength(s, "utf8");
}

function isControl(ch: string): boolean {
  return ch.charCodeAt(0) < 32;
}

export function isFilenameIssueType(value: string): value is FilenameIssueType {
  return FILENAME_ISSUE_TYPES.some((t) => t === value);
}

export function checkFilename(name: string): NameCheck | null {
  for (const [ch, type] of RESERVED_CHARS) {
    if (name.includes(ch)) return { type, char: ch };
  }
  for (const ch of name) {
    if (isControl(ch)) return { type: "control_char", char: ch };
  }
  if (name.startsWith(" ")) return { type: "leading_space", char: " " };
  if (name.endsWith(" ")) return { type: "trailing_space", char: " " };
  if (name.endsWith(".") && name !== "." && name !== "..") {
    return { type: "trailing_dot", char: "." };
  }
  if (byteLength(name) > MAX_NAME_BYTES) return { type: "too_long", char: null };
  return null;
}

export function suggestFilename(name: string): string {
  let out = name;
  for (const [ch, , replacement] of RESERVED_CHARS) {
    out = out.split(ch).join(replacement);
  }
  out = Array.from(out)
    .filter((ch) => !isControl(ch))
    .join("");
  out = out.replace(/^ +| +$/g, "").replace(/\.+$/, "");
  if (!out) out = "_renamed_";
  if (byteLength(out) > MAX_NAME_BYTES) {
    const ext = path.extname(out);
    const maxBase = MAX_NAME_BYTES - byteLength(ext) - 1;
    const base = Array.from(out.slice(0, out.length - ext.length));
    while (base.length && byteLength(base.join("")) > maxBase) base.pop();
    out = base.join("") + ext;
  }
  return out;
}

export function filenameIssue(
  relativePath: string,
  name: string,
  isDirectory: boolean,
): FilenameIssue | null {
  const found = checkFilename(name);
  if (!found) return null;
  const suggested = suggestFilename(name);
  return {
    ...found,
    relativePath,
    name,
    isDirectory,
    suggestedName: suggested !== name && !checkFilename(suggested) ? suggested : null,
  };
}
