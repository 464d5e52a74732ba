import { z } from 'zod';

import { blankToNull } from '../utils/text';
import { isDateKey } from '../utils/time';
import { ListingValidationError } from './errors';

const text = z
  .string()
  .nullish()
  .transform((value) => blankToNull(value));

const textOrNumber = z
  .union([z.string(), z.number().finite()])
  .nullish()
  .transform((value) => blankToNull(value === null || value === undefined ? value : String(value)));

const sellerSchema = z
  .union([
    z.object({
      phone: text,
      profileUrl: text
    }),
    z.string()
  ])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value === 'string') {
      const phone = blankToNull(value);
      return phone === null ? null : { phone, profileUrl: null };
    }
    return value.phone === null && value.profileUrl === null ? null : value;
  });

export const listingInputSchema = z.object({
  id: z
    .union([z.string(), z.number().int()])
    .transform((value) => String(value))
    .pipe(z.string().trim().min(1, 'is required')),
  source: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  price: z.number().finite().nonnegative().nullish().transform((value) => value ?? null),
  area: textOrNumber,
  description: text,
  url: text,
  floor: textOrNumber,
  address: text,
  lat: textOrNumber,
  lng: textOrNumber,
  seller: sellerSchema,
  photos: z.array(z.string().trim().min(1)).default([]),
  status: z.enum(['open', 'closed']).default('open'),
  visible: z.boolean().default(true)
});

/** What scrapers hand to `saveListing`. */
export type ListingInput = z.input<typeof listingInputSchema>;

export type NormalizedListing = z.output<typeof listingInputSchema>;

export const sessionStartSchema = z.object({
  source: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  notes: z.string().default('')
});

export const sessionTotalsSchema = z.object({
  totalParsed: z.number().int().nonnegative(),
  totalSaved: z.number().int().nonnegative()
});

export const listingIdSchema = z.string().trim().min(1, 'is required');

export const dateKeySchema = z.string().refine(isDateKey, 'expected a calendar date as YYYY-MM-DD');

export function pageLimitSchema(maxPageSize: number) {
  return z.number().int().positive().max(maxPageSize);
}

export function listingQuerySchema(maxPageSize: number) {
  return z
    .object({
      limit: pageLimitSchema(maxPageSize),
      offset: z.number().int().nonnegative().default(0),
      source: z.string().trim().min(1).optional(),
      status: z.enum(['open', 'closed']).optional(),
      visible: z.boolean().optional(),
      minPrice: z.number().finite().optional(),
      maxPrice: z.number().finite().optional(),
      addressContains: z.string().trim().min(1).optional()
    })
    .refine(
      (query) => query.minPrice === undefined || query.maxPrice === undefined || query.minPrice <= query.maxPrice,
      { message: 'minPrice must not exceed maxPrice', path: ['minPrice'] }
    );
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

export function validate<Schema extends z.ZodTypeAny>(
  schema: Schema,
  value: unknown,
  subject: string
): z.output<Schema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ListingValidationError(subject, formatIssues(result.error));
  }
  return result.data;
}
