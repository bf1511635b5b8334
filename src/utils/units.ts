const BYTE_MULTIPLIERS: Record<string, number> = {
  "": 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
  t: 1024 ** 4,
  p: 1024 ** 5,
};

const DURATION_UNITS_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parses a Compose byte size such as `64m`, `1gb` or `512` into bytes.
 * Multipliers are binary (1k = 1024).
 */
export function parseByteSize(value: number | string): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`invalid size: ${value}`);
    }
    return Math.trunc(value);
  }

  const match = /^(-?\d+(?:\.\d+)?)\s*([kmgtp]?)(?:i?b)?$/i.exec(value.trim());
  if (!match) {
    throw new Error(`invalid size: '${value}'`);
  }

  const [, amount, unit] = match;
  return Math.trunc(Number(amount) * BYTE_MULTIPLIERS[unit.toLowerCase()]);
}

/**
 * Parses a Compose duration (`1m30s`, `500ms`, `2h`) into milliseconds.
 * A bare `0` is accepted.
 */
export function parseDuration(value: string): number {
  const input = value.trim();
  if (input === "0") return 0;

  const sign = input.startsWith("-") ? -1 : 1;
  const body = input.replace(/^[-+]/, "");
  const pattern = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/gy;

  let total = 0;
  let consumed = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(body)) !== null) {
    total += Number(match[1]) * DURATION_UNITS_MS[match[2]];
    consumed = pattern.lastIndex;
  }

  if (body.length === 0 || consumed !== body.length) {
    throw new Error(`invalid duration: '${value}'`);
  }
  return sign * total;
}
