import { isValidString } from "./typeguards.js";

type DatePart = "year" | "month" | "day" | "hour" | "minute" | "second";

const DIRECTIVES: Record<string, { part: DatePart; pattern: string }> = {
  Y: { part: "year", pattern: "(\\d{4})" },
  m: { part: "month", pattern: "(\\d{1,2})" },
  d: { part: "day", pattern: "(\\d{1,2})" },
  H: { part: "hour", pattern: "(\\d{1,2})" },
  M: { part: "minute", pattern: "(\\d{1,2})" },
  S: { part: "second", pattern: "(\\d{1,2})" },
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

interface CompiledFormat {
  regex: RegExp;
  parts: DatePart[];
}

const compiled = new Map<string, CompiledFormat>();

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compileFormat(format: string): CompiledFormat {
  const cached = compiled.get(format);
  if (cached) return cached;

  const parts: DatePart[] = [];
  let pattern = "";
  for (let i = 0; i < format.length; i++) {
    const char = format.charAt(i);
    if (char !== "%" || i === format.length - 1) {
      pattern += escapeRegex(char);
      continue;
    }
    const code = format.charAt(++i);
    const directive = DIRECTIVES[code];
    if (directive) {
      parts.push(directive.part);
      pattern += directive.pattern;
    } else {
      // %% and unknown directives match themselves
      pattern += escapeRegex(code === "%" ? "%" : `%${code}`);
    }
  }

  const result = { regex: new RegExp(`^${pattern}$`), parts };
  compiled.set(format, result);
  return result;
}

/**
 * Parse a date string with a `%Y-%m-%d` style format, in UTC.
 * Returns `null` for anything that is not a string or does not match.
 */
export function parseDate(value: unknown, format: string): Date | null {
  if (!isValidString(value)) return null;

  const { regex, parts } = compileFormat(format);
  const match = regex.exec(value.trim());
  if (!match) return null;

  const fields: Record<DatePart, number> = { year: 1900, month: 1, day: 1, hour: 0, minute: 0, second: 0 };
  parts.forEach((part, index) => {
    fields[part] = parseInt(match[index + 1] ?? "", 10);
  });

  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  date.setUTCHours(fields.hour, fields.minute, fields.second, 0);
  // Reject values that roll over, such as 2024-02-30
  if (
    date.getUTCFullYear() !== fields.year ||
    date.getUTCMonth() !== fields.month - 1 ||
    date.getUTCDate() !== fields.day ||
    date.getUTCHours() !== fields.hour ||
    date.getUTCMinutes() !== fields.minute ||
    date.getUTCSeconds() !== fields.second
  ) {
    return null;
  }
  return date;
}

/**
 * Format a date in UTC with the same directives `parseDate` accepts
 */
export function formatDate(date: Date, format: string): string {
  const pad = (n: number, width: number = 2) => String(n).padStart(width, "0");
  const values: Record<string, string> = {
    Y: pad(date.getUTCFullYear(), 4),
    m: pad(date.getUTCMonth() + 1),
    d: pad(date.getUTCDate()),
    H: pad(date.getUTCHours()),
    M: pad(date.getUTCMinutes()),
    S: pad(date.getUTCSeconds()),
    "%": "%",
  };
  return format.replace(/%(.)/g, (directive, code: string) => values[code] ?? directive);
}

/**
 * Whole days from `earlier` to `later`, rounded down
 */
export function daysBetween(earlier: Date, later: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / MS_PER_DAY);
}
