export function isPidAlive(pid: number | null | undefined): boolean {
  if (!pid) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function truncateMiddle(input: string, max = 200): string {
  if (input.length <= max) return input;
  const half = Math.floor((max - 3) / 2);
  return `${input.slice(0, half)}...${input.slice(-half)}`;
}
