import { assertYYYYMMDD, getTodayDateString } from "../../src/lib/date";

export function getArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];

    if (a === `--${name}`) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.startsWith("--")) {
        throw new Error(`Expected value after --${name}`);
      }

      return next;
    }

    if (a.startsWith(prefix)) {
      return a.slice(prefix.length);
    }
  }
  return undefined;
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(`--${name}`);
}

export function getDateArg(argv: string[], timeZone?: string): string {
  const today = getTodayDateString(timeZone);
  const date = getArg(argv, "date") ?? today;
  assertYYYYMMDD(date);

  if (date > today) {
    throw new Error(`Date cannot be in the future. Got ${date}, today is ${today}`);
  }

  return date;
}

export function getIntegerArg(argv: string[], name: string, max: number): number | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || String(parsed) !== raw.trim() || parsed <= 0 || parsed > max) {
    throw new Error(`--${name} must be a positive integer ≤ ${max}, got '${raw}'`);
  }
  return parsed;
}
