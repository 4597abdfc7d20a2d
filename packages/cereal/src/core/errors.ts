import { Match } from "effect"

// CHANGE: unify error algebra for resolution, runtime lookup and conversion
// WHY: every engine operation is fallible and callers match on stable tags
// QUOTE(TZ): "all failures are surfaced synchronously to the direct caller"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type PathSegment = string | number

export type ConversionErrorKind = "TypeMismatch" | "MissingField" | "MalformedScalar"

export type ConstructionError = {
  readonly _tag: "ConstructionError"
  readonly message: string
  readonly cause?: unknown
}
export type ClassNotFound = { readonly _tag: "ClassNotFound"; readonly name: string }
export type ConversionError = {
  readonly _tag: "ConversionError"
  readonly kind: ConversionErrorKind
  readonly message: string
  readonly path: ReadonlyArray<PathSegment>
}

export type CerealError = ConstructionError | ClassNotFound | ConversionError

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type TypeTableError = { readonly _tag: "TypeTableError"; readonly name: string }

export type AppError = CerealError | ConfigError | FileError | TypeTableError

export const constructionError = (message: string, cause?: unknown): ConstructionError =>
  cause === undefined
    ? { _tag: "ConstructionError", message }
    : { _tag: "ConstructionError", message, cause }

export const classNotFound = (name: string): ClassNotFound => ({
  _tag: "ClassNotFound",
  name
})

export const typeMismatch = (message: string): ConversionError => ({
  _tag: "ConversionError",
  kind: "TypeMismatch",
  message,
  path: []
})

export const missingField = (field: string): ConversionError => ({
  _tag: "ConversionError",
  kind: "MissingField",
  message: `missing required field "${field}"`,
  path: [field]
})

export const malformedScalar = (message: string): ConversionError => ({
  _tag: "ConversionError",
  kind: "MalformedScalar",
  message,
  path: []
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const typeTableError = (name: string): TypeTableError => ({
  _tag: "TypeTableError",
  name
})

/**
 * Prefix the location of a nested conversion failure.
 *
 * @param segment - Field name or element index of the enclosing slot.
 * @returns Mapper that leaves non-conversion errors untouched.
 *
 * @pure true
 * @invariant path order is root → leaf
 * @complexity O(d) where d = path depth
 */
export const atPath = (segment: PathSegment) => (error: CerealError): CerealError =>
  error._tag === "ConversionError" ? { ...error, path: [segment, ...error.path] } : error

const renderPath = (path: ReadonlyArray<PathSegment>): string =>
  path.length === 0 ? "$" : `$${path.map((segment) => typeof segment === "number" ? `[${segment}]` : `.${segment}`).join("")}`

export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "ConstructionError" }, (value) => `[construction] ${value.message}`),
    Match.when({ _tag: "ClassNotFound" }, (value) => `[class-not-found] ${value.name}`),
    Match.when(
      { _tag: "ConversionError" },
      (value) => `[${value.kind}] ${renderPath(value.path)}: ${value.message}`
    ),
    Match.when({ _tag: "ConfigError" }, (value) => `[config] ${value.message}`),
    Match.when({ _tag: "FileError" }, (value) => `[file] ${value.message}`),
    Match.when({ _tag: "TypeTableError" }, (value) => `[type-table] duplicate type name ${value.name}`),
    Match.exhaustive
  )
