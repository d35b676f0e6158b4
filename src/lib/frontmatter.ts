import { JSON_SCHEMA, load } from 'js-yaml';
import { z } from 'zod';

/**
 * YAML engine for gray-matter. The JSON schema keeps timestamps as strings, so
 * every date goes through parseIsoDate (js-yaml would roll 2024-02-30 over to March).
 */
export function parseFrontmatterYaml(source: string): object {
  const data = load(source, { schema: JSON_SCHEMA });
  if (data === undefined || data === null) return {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('front-matter must be a mapping of key: value pairs');
  }
  return data;
}

// YYYY-MM-DD, optionally followed by a time and a UTC offset
const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses an ISO-8601-like timestamp. A value without an offset is read as UTC
 * so the same source gives the same date on every machine.
 */
export function parseIsoDate(value: string): Date | undefined {
  const match = ISO_DATE_REGEX.exec(value.trim());
  if (!match) return undefined;
  const [, year, month, day, hour = '00', minute = '00', second = '00', millis = '0', offset] = match;
  const monthIndex = Number(month) - 1;
  const stamp = Date.UTC(Number(year), monthIndex, Number(day), Number(hour), Number(minute), Number(second), Number(millis.padEnd(3, '0')));
  const date = new Date(stamp);
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (date.getUTCMonth() !== monthIndex || date.getUTCDate() !== Number(day) || Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return undefined;
  }
  if (!offset || offset === 'Z') return date;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const offsetMinutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  return new Date(stamp - sign * offsetMinutes * 60_000);
}

const dateField = z
  .union([z.date(), z.string()], {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined ? 'date is required' : 'date must be an ISO-8601 timestamp such as 2024-05-01',
    }),
  })
  .transform((value, ctx) => {
    const date = value instanceof Date ? value : parseIsoDate(value);
    if (!date || Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `date "${String(value)}" is not a valid ISO-8601 timestamp` });
      return z.NEVER;
    }
    return date;
  });

export const PostFrontmatterSchema = z.object({
  title: z
    .string({ required_error: 'title is required', invalid_type_error: 'title must be text' })
    .trim()
    .min(1, 'title must not be empty'),
  date: dateField,
  draft: z.boolean({ invalid_type_error: 'draft must be true or false' }).default(false),
  excerpt: z.string({ invalid_type_error: 'excerpt must be text' }).trim().min(1).optional(),
});

export type PostFrontmatter = z.infer<typeof PostFrontmatterSchema>;

/** Flattens zod issues into a single human-readable line. */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => issue.message).join('; ');
}
