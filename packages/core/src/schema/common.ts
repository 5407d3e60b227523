/**
 * Shared Zod schemas used by the note and assignment schemas.
 */

import { z } from 'zod';

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

/**
 * Parse an ISO-8601 date or timestamp. Minutes, seconds and fractions are
 * optional. A bare date, or a timestamp without an offset, is read in local
 * time. Returns null for anything else, including calendar dates and clock
 * times that do not exist (2025-02-30, 24:00).
 */
export function parseIsoTimestamp(value: string): Date | null {
  const m = ISO_RE.exec(value.trim());
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }

  const hour = Number(m[4] ?? 0);
  const minute = Number(m[5] ?? 0);
  const second = Number(m[6] ?? 0);
  const ms = Number((m[7] ?? '').padEnd(3, '0').slice(0, 3));
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offset = m[8];
  if (offset === undefined) {
    return new Date(year, month - 1, day, hour, minute, second, ms);
  }

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, ms);
  return new Date(utc - offsetMinutes(offset) * 60_000);
}

/** `Z` -> 0, `+02:00` -> 120, `-0530` -> -330, `+01` -> 60 */
function offsetMinutes(offset: string): number {
  if (offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2) || '0'));
}

export const TimestampSchema = z.string().transform((value, ctx) => {
  const parsed = parseIsoTimestamp(value);
  if (parsed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Not an ISO-8601 date or timestamp: '${value}'`,
    });
    return z.NEVER;
  }
  return parsed;
});

export const RecordIdSchema = z.number().int().positive();

/** Tags as an array or a comma-separated string; blank entries are dropped */
export const TagsInputSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (typeof value === 'string' ? value.split(',') : value)
      .map((t) => t.trim())
      .filter((t) => t.length > 0),
  );

/** Untyped field map, as assembled from user input before validation */
export type RawInput = Readonly<Record<string, unknown>>;
