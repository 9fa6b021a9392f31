export function getArgValue(argv: readonly string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx !== -1 && idx + 1 < argv.length) {
    return argv[idx + 1];
  }
  return undefined;
}

/** Non-negative integer flag value, or `fallback` when absent */
export function getIntArg(argv: readonly string[], flag: string, fallback: number): number {
  const raw = getArgValue(argv, flag);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return n;
}
