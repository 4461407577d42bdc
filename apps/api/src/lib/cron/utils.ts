export const parseCSV = (s: string | undefined) =>
  (s ?? '')
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);

// ---- Flags parsing + typed accessors ---------------------------------------

export type Flags = Record<string, string>; // values are always strings

/** Parse --k=v and bare --k (as "true"). All values are strings. */
export function parseFlags(argv: string[] = []): Flags {
  const flags: Flags = {};
  for (const a of argv) {
    if (!a.startsWith('--')) continue;
    const m = /^--([^=]+)(?:=(.*))?$/.exec(a);
    const key = m?.[1]?.trim();
    if (!key) continue;
    flags[key] = (m?.[2] ?? 'true').trim(); // bare --key => "true"
  }
  return flags;
}

/** Get a string flag (empty/whitespace → undefined). */
export function flagStr(flags: Flags, key: string): string | undefined {
  const v = flags[key];
  if (typeof v !== 'string') return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

/** Get a boolean flag. Accepts true/false/1/0/yes/no/on/off (case-insensitive). */
export function flagBool(flags: Flags, key: string): boolean {
  const v = flagStr(flags, key);
  if (v == null) return false;
  return /^(?:1|true|t|yes|y|on)$/i.test(v);
}

/** Get a number flag. Returns undefined if NaN. */
export function flagNum(flags: Flags, key: string): number | undefined {
  const s = flagStr(flags, key);
  if (s == null) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

/** Positive integer flag. Absent → undefined; anything else that is not one throws. */
export function flagPositiveInt(flags: Flags, key: string): number | undefined {
  const s = flagStr(flags, key);
  if (s == null) return undefined;
  const n = Number(s);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`--${key} must be a positive integer, got "${s}"`);
  }
  return n;
}

export function requireFlag(flags: Flags, key: string): string {
  const v = flagStr(flags, key);
  if (v === undefined) throw new Error(`Missing required flag --${key}`);
  return v;
}

/** Split comma/space-separated flag into array of non-empty tokens. */
export function flagCSV(flags: Flags, key: string): string[] {
  const s = flagStr(flags, key);
  if (!s) return [];
  return s
    .split(/[,\s]+/)
    .map((x) => x.trim())
    .filter(Boolean);
}
