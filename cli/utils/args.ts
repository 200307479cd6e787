/**
 * Value following `--name`, or undefined when the flag is absent.
 */
export function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  return idx !== -1 ? args[idx + 1] : undefined;
}

export function readNumberFlag(args: string[], name: string, fallback: number): number {
  const raw = readFlag(args, name);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`--${name} expects a positive number, got "${raw}"`);
  }
  return parsed;
}

/**
 * Arguments that are neither flags nor the values of `valueFlags`.
 */
export function positionals(args: string[], valueFlags: string[] = []): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (valueFlags.includes(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}
