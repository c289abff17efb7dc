/**
 * Zod schemas for typed output specifications.
 *
 * A TypedOutputSpec is a closed union of the three result shapes the engine
 * can produce: boolean, bounded integer and enumerated string.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

export const BooleanOutputSpecSchema = z
  .object({
    kind: z.literal('boolean'),
  })
  .strict()

export type BooleanOutputSpec = z.infer<typeof BooleanOutputSpecSchema>

export const BoundedIntegerOutputSpecSchema = z
  .object({
    kind: z.literal('bounded-integer'),
    low: z.number().int().safe(),
    high: z.number().int().safe(),
  })
  .strict()
  .refine((spec) => spec.low <= spec.high, {
    message: 'low must be less than or equal to high',
    path: ['low'],
  })

export type BoundedIntegerOutputSpec = z.infer<typeof BoundedIntegerOutputSpecSchema>

export const EnumStringOutputSpecSchema = z
  .object({
    kind: z.literal('enum-string'),
    allowedValues: z
      .array(
        z
          .string()
          .refine((v) => v.trim().length > 0, { message: 'allowed values must not be blank' })
          .refine((v) => !/[\r\n]/.test(v), { message: 'allowed values must fit on one line' }),
      )
      .min(1, { message: 'allowedValues must not be empty' }),
    caseSensitive: z.boolean(),
  })
  .strict()
  .superRefine((spec, ctx) => {
    const seen = new Set<string>()
    for (const value of spec.allowedValues) {
      const key = spec.caseSensitive ? value.trim() : value.trim().toLowerCase()
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `allowed value "${value}" is duplicated after normalization`,
          path: ['allowedValues'],
        })
      }
      seen.add(key)
    }
  })

export type EnumStringOutputSpec = z.infer<typeof EnumStringOutputSpecSchema>

// ---------------------------------------------------------------------------
// Union
// ---------------------------------------------------------------------------

export type TypedOutputSpec = BooleanOutputSpec | BoundedIntegerOutputSpec | EnumStringOutputSpec

export type OutputKind = TypedOutputSpec['kind']

export const OUTPUT_KINDS: readonly OutputKind[] = ['boolean', 'bounded-integer', 'enum-string']
