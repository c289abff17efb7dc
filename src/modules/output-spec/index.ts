/**
 * output-spec module — typed result shapes and their validation.
 */

export type {
  BooleanOutputSpec,
  BoundedIntegerOutputSpec,
  EnumStringOutputSpec,
  TypedOutputSpec,
  OutputKind,
} from './schemas.js'
export {
  BooleanOutputSpecSchema,
  BoundedIntegerOutputSpecSchema,
  EnumStringOutputSpecSchema,
  OUTPUT_KINDS,
} from './schemas.js'
export {
  parseOutputSpec,
  matchAllowedValue,
  valueKey,
  compareValues,
  describeOutputSpec,
  formatIssues,
} from './output-spec.js'
