// CHANGE: introduce the generic representation every converter targets
// WHY: keep converters independent of any wire encoding
// QUOTE(TZ): "scalars, ordered sequences, and maps of the same"
// REF: req-generic-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ GenericValue: scalar(x) ∨ ∀c ∈ children(x): c ∈ GenericValue
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: DISCRIMINATOR_KEY is the only reserved map key
// COMPLEXITY: O(1)/O(1)

export type GenericValue =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<GenericValue>
  | { readonly [key: string]: GenericValue }

export type GenericMap = { readonly [key: string]: GenericValue }

export const DISCRIMINATOR_KEY = "--class"

export const isGenericArray = (value: GenericValue): value is ReadonlyArray<GenericValue> => Array.isArray(value)

export const isGenericMap = (value: GenericValue): value is GenericMap =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const describeGeneric = (value: GenericValue): string => {
  if (value === null) {
    return "null"
  }
  if (Array.isArray(value)) {
    return "array"
  }
  return typeof value === "object" ? "map" : typeof value
}
