import { z } from 'zod';

/**
 * Zod schema for a normalized date entry
 *
 * Input reaches this schema after digit and separator normalization
 * (see DateParser), so only ASCII digits and `-` are expected.
 *
 * Validation Rules:
 * - four-digit year
 * - one- or two-digit month and day
 * - nothing before or after the date
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const DateEntrySchema = z
  .string()
  .regex(/^\d{4}-\d{1,2}-\d{1,2}$/, 'Date must be in YYYY-MM-DD format')
  .transform((value) => {
    const [year, month, day] = value.split('-').map((part) => parseInt(part, 10));
    return { year: year ?? NaN, month: month ?? NaN, day: day ?? NaN };
  });

/**
 * TypeScript type derived from DateEntrySchema
 */
export type DateEntry = z.output<typeof DateEntrySchema>;

/**
 * Zod schema for time source responses
 *
 * Only `datetime` is read; its first ten characters must be YYYY-MM-DD.
 * Other fields returned by the endpoint (timezone, unixtime, ...) pass through.
 *
 * Example:
 * ```json
 * { "datetime": "2025-10-18T14:23:45.123456+00:00", "timezone": "Etc/UTC" }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const TimeSourceResponseSchema = z
  .object({
    datetime: z.string().regex(/^\d{4}-\d{2}-\d{2}/, 'datetime must start with YYYY-MM-DD'),
  })
  .passthrough();

/**
 * TypeScript type derived from TimeSourceResponseSchema
 */
export type TimeSourceResponse = z.infer<typeof TimeSourceResponseSchema>;
