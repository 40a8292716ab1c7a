// Reconciliation config validation
//
// Zod schemas for the JSON config that declares the sources, their column
// mappings and the deduplication policy.

import { z } from 'zod';
import { CANONICAL_FIELDS, CANONICAL_FIELD_KINDS } from '../types/records.js';

export const CanonicalFieldSchema = z.enum(CANONICAL_FIELDS);

export const AttributeValueSchema = z.union([z.string(), z.number().finite()]);

const CALENDAR_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

/**
 * A single column name or an ordered list of candidates
 */
const ColumnListSchema = z
  .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
  .transform((value) => (typeof value === 'string' ? [value] : value));

export const SourceMappingSchema = z
  .object({
    identifier: ColumnListSchema,
    fields: z.record(CanonicalFieldSchema, ColumnListSchema),
    fixed: z.record(CanonicalFieldSchema, AttributeValueSchema).optional(),
    textCase: z.enum(['preserve', 'upper']).default('preserve'),
  })
  .superRefine((mapping, ctx) => {
    for (const [field, value] of Object.entries(mapping.fixed ?? {})) {
      if (field in mapping.fields) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fixed', field],
          message: `"${field}" is both mapped from columns and fixed`,
        });
      }

      const parsedField = CanonicalFieldSchema.safeParse(field);
      if (!parsedField.success) continue;

      const kind = CANONICAL_FIELD_KINDS[parsedField.data];
      if (kind === 'number' && typeof value !== 'number') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fixed', field],
          message: `"${field}" must be a number`,
        });
      }
      if (kind === 'date' && (typeof value !== 'string' || !CALENDAR_DATE_REGEX.test(value))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fixed', field],
          message: `"${field}" must be a date in YYYY-MM-DD format`,
        });
      }
      if (kind === 'string' && typeof value !== 'string') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fixed', field],
          message: `"${field}" must be a string`,
        });
      }
    }
  });

export const SourceConfigSchema = z.object({
  tag: z.string().min(1, 'Source tag is required'),
  mapping: SourceMappingSchema,
});

export const ReconcileConfigSchema = z
  .object({
    sources: z.array(SourceConfigSchema).min(1, 'At least one source is required'),
    /** Later tags take precedence; defaults to the order of `sources` */
    sourcePriority: z.array(z.string().min(1)).optional(),
    strict: z.boolean().default(false),
    identityFields: z.array(CanonicalFieldSchema).default(['registrationDate']),
    dateToleranceDays: z.number().int().nonnegative().default(0),
    numericTolerance: z.number().nonnegative().default(0),
    maxWarnings: z.number().int().nonnegative().default(1000),
  })
  .superRefine((config, ctx) => {
    const tags = new Set<string>();
    config.sources.forEach((source, index) => {
      if (tags.has(source.tag)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'tag'],
          message: `Duplicate source tag "${source.tag}"`,
        });
      }
      tags.add(source.tag);
    });

    if (config.sourcePriority) {
      for (const tag of tags) {
        if (!config.sourcePriority.includes(tag)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['sourcePriority'],
            message: `Source "${tag}" is missing from sourcePriority`,
          });
        }
      }
    }
  });

export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;

/**
 * Validate a reconciliation config
 * @throws ZodError if validation fails
 */
export function parseReconcileConfig(data: unknown): ReconcileConfig {
  return ReconcileConfigSchema.parse(data);
}

/**
 * Validate a reconciliation config safely (returns result object)
 */
export function safeParseReconcileConfig(
  data: unknown
): z.SafeParseReturnType<unknown, ReconcileConfig> {
  return ReconcileConfigSchema.safeParse(data);
}

/**
 * Format Zod errors as `path: message` lines
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
