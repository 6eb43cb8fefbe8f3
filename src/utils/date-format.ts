/**
 * Fixed-width date/time patterns used for log timestamps and period keys.
 *
 * Supported tokens: `yyyy`, `MM`, `dd`, `HH`, `mm`, `ss`, `SSS`. Any other character is a literal.
 * The same pattern both formats and parses, so a period directory named with the date
 * pattern can later be read back by the rotation sweep.
 * @module
 */

export type TimeZoneMode = "utc" | "local";

export interface DateFormat {
  readonly pattern: string;
  readonly timeZone: TimeZoneMode;
  format(date: Date): string;
  /** Returns null when the text does not match the pattern or names an impossible date. */
  parse(text: string): Date | null;
}

type Field = "year" | "month" | "day" | "hour" | "minute" | "second" | "millisecond";

interface TokenSpec {
  field: Field;
  width: number;
}

const TOKENS: Record<string, TokenSpec> = {
  yyyy: { field: "year", width: 4 },
  MM: { field: "month", width: 2 },
  dd: { field: "day", width: 2 },
  HH: { field: "hour", width: 2 },
  mm: { field: "minute", width: 2 },
  ss: { field: "second", width: 2 },
  SSS: { field: "millisecond", width: 3 },
};

const TOKEN_PATTERN = /yyyy|SSS|MM|dd|HH|mm|ss/g;

type Part = { kind: "literal"; text: string } | { kind: "token"; spec: TokenSpec };

function tokenize(pattern: string): Part[] {
  const parts: Part[] = [];
  let lastIndex = 0;
  for (const match of pattern.matchAll(TOKEN_PATTERN)) {
    const index = match.index ?? 0;
    if (index > lastIndex) parts.push({ kind: "literal", text: pattern.slice(lastIndex, index) });
    const spec = TOKENS[match[0]];
    if (spec) parts.push({ kind: "token", spec });
    lastIndex = index + match[0].length;
  }
  if (lastIndex < pattern.length) parts.push({ kind: "literal", text: pattern.slice(lastIndex) });
  return parts;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function readFields(date: Date, timeZone: TimeZoneMode): Record<Field, number> {
  if (timeZone === "utc") {
    return {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hour: date.getUTCHours(),
      minute: date.getUTCMinutes(),
      second: date.getUTCSeconds(),
      millisecond: date.getUTCMilliseconds(),
    };
  }
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
    millisecond: date.getMilliseconds(),
  };
}

function buildDate(fields: Record<Field, number>, timeZone: TimeZoneMode): Date {
  const { year, month, day, hour, minute, second, millisecond } = fields;
  if (timeZone === "utc") {
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
    // Date.UTC maps years 0-99 onto 1900-1999
    date.setUTCFullYear(year);
    return date;
  }
  const date = new Date(year, month - 1, day, hour, minute, second, millisecond);
  date.setFullYear(year);
  return date;
}

export function createDateFormat(pattern: string, timeZone: TimeZoneMode = "utc"): DateFormat {
  const parts = tokenize(pattern);
  const tokenParts = parts.filter((p): p is Extract<Part, { kind: "token" }> => p.kind === "token");
  const matcher = new RegExp(
    `^${parts
      .map((p) => (p.kind === "literal" ? escapeRegExp(p.text) : `(\\d{${p.spec.width}})`))
      .join("")}$`,
  );

  return {
    pattern,
    timeZone,

    format(date: Date): string {
      const fields = readFields(date, timeZone);
      return parts
        .map((p) =>
          p.kind === "literal" ? p.text : String(fields[p.spec.field]).padStart(p.spec.width, "0"),
        )
        .join("");
    },

    parse(text: string): Date | null {
      const match = matcher.exec(text);
      if (!match) return null;

      const fields: Record<Field, number> = {
        year: 1970,
        month: 1,
        day: 1,
        hour: 0,
        minute: 0,
        second: 0,
        millisecond: 0,
      };
      tokenParts.forEach((p, i) => {
        fields[p.spec.field] = Number(match[i + 1]);
      });

      const date = buildDate(fields, timeZone);
      // Reject overflowed values such as 31.02 or 25:00
      const roundTrip = readFields(date, timeZone);
      for (const p of tokenParts) {
        if (roundTrip[p.spec.field] !== fields[p.spec.field]) return null;
      }
      return date;
    },
  };
}

export const DEFAULT_TIME_PATTERN = "HH:mm:ss.SSS";
export const DEFAULT_DATE_PATTERN = "dd.MM.yyyy";
