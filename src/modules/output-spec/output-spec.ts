/**
 * Validation and value helpers for typed output specifications.
 */

import type { ZodError } from 'zod'
import { ValidationError } from '../../core/errors.js'
import type { DecisionValue } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'
import {
  BooleanOutputSpecSchema,
  BoundedIntegerOutputSpecSchema,
  EnumStringOutputSpecSchema,
  OUTPUT_KINDS,
  type EnumStringOutputSpec,
  type OutputKind,
  type TypedOutputSpec,
} from './schemas.js'

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isOutputKind(value: unknown): value is OutputKind {
  return OUTPUT_KINDS.some((kind) => kind === value)
}

/** Flatten zod issues into "path: message" strings under a common prefix */
export function formatIssues(error: ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter((p) => p.length > 0).join('.')
    return `${path}: ${issue.message}`
  })
}

/**
 * Validate an untrusted value as a TypedOutputSpec.
 *
 * @throws {ValidationError} listing every issue found
 */
export function parseOutputSpec(input: unknown, prefix = 'outputSpec'): TypedOutputSpec {
  if (!isPlainObject(input)) {
    throw new ValidationError('Invalid output spec', [`${prefix}: must be an object`])
  }
  const kind = input.kind
  if (!isOutputKind(kind)) {
    throw new ValidationError('Invalid output spec', [
      `${prefix}.kind: must be one of ${OUTPUT_KINDS.join(', ')}`,
    ])
  }

  switch (kind) {
    case 'boolean': {
      const parsed = BooleanOutputSpecSchema.safeParse(input)
      if (parsed.success) return parsed.data
      throw new ValidationError('Invalid output spec', formatIssues(parsed.error, prefix))
    }
    case 'bounded-integer': {
      const parsed = BoundedIntegerOutputSpecSchema.safeParse(input)
      if (parsed.success) return parsed.data
      throw new ValidationError('Invalid output spec', formatIssues(parsed.error, prefix))
    }
    case 'enum-string': {
      const parsed = EnumStringOutputSpecSchema.safeParse(input)
      if (parsed.success) return parsed.data
      throw new ValidationError('Invalid output spec', formatIssues(parsed.error, prefix))
    }
    default: {
      const exhaustive: never = kind
      throw new ValidationError(`Unknown output kind: ${String(exhaustive)}`)
    }
  }
}

// ---------------------------------------------------------------------------
// Enum normalization
// ---------------------------------------------------------------------------

function normalizeForCompare(value: string, caseSensitive: boolean): string {
  const trimmed = value.trim()
  return caseSensitive ? trimmed : trimmed.toLowerCase()
}

/**
 * Find the allowed value matching `candidate` exactly after normalization
 * (trim, and lowercase both sides unless the spec is case sensitive).
 *
 * @returns the allowed value as declared in the spec, or undefined
 */
export function matchAllowedValue(
  spec: EnumStringOutputSpec,
  candidate: string,
): string | undefined {
  const needle = normalizeForCompare(candidate, spec.caseSensitive)
  return spec.allowedValues.find(
    (allowed) => normalizeForCompare(allowed, spec.caseSensitive) === needle,
  )
}

// ---------------------------------------------------------------------------
// Value ordering
// ---------------------------------------------------------------------------

/** Stable identity key for a decoded value (booleans and numbers never collide with strings) */
export function valueKey(value: DecisionValue): string {
  return `${typeof value}:${String(value)}`
}

/**
 * Total order over decoded values: false < true, numbers ascending,
 * strings by code unit. Values of different types are ordered by type name.
 */
export function compareValues(a: DecisionValue, b: DecisionValue): number {
  if (typeof a !== typeof b) {
    return typeof a < typeof b ? -1 : 1
  }
  if (a === b) return 0
  if (typeof a === 'number' && typeof b === 'number') return a - b
  return String(a) < String(b) ? -1 : 1
}

/** Short human-readable description of a spec, for logs and prompts */
export function describeOutputSpec(spec: TypedOutputSpec): string {
  switch (spec.kind) {
    case 'boolean':
      return 'boolean'
    case 'bounded-integer':
      return `integer in [${String(spec.low)}, ${String(spec.high)}]`
    case 'enum-string':
      return `one of {${spec.allowedValues.join(', ')}}${spec.caseSensitive ? ' (case sensitive)' : ''}`
  }
}
