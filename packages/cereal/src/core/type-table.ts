import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { TypeTableError } from "./errors.js"
import { typeTableError } from "./errors.js"
import type { ClassType, NamedType } from "./type-descriptor.js"

// CHANGE: replace open class lookup with a closed name → type table
// WHY: discriminator names must resolve without runtime class loading
// QUOTE(TZ): "any type pre-registered"
// REF: req-type-table-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t ∈ types: lookup(t.name) = Some(t)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a name maps to exactly one descriptor
// COMPLEXITY: O(n) build, O(1) lookup

export interface TypeTable {
  readonly lookup: (name: string) => Option.Option<NamedType>
  readonly byConstructor: (ctor: unknown) => Option.Option<ClassType>
  readonly names: ReadonlyArray<string>
}

/**
 * Build the table of types that discriminators and runtime dispatch may name.
 *
 * @param types - Enumeration and class descriptors, in registration order.
 * @returns TypeTable, or TypeTableError when one name is bound to two descriptors.
 *
 * @pure true
 * @invariant registering the same descriptor twice is a no-op
 * @complexity O(n)
 */
export const makeTypeTable = (
  types: ReadonlyArray<NamedType>
): Either.Either<TypeTable, TypeTableError> => {
  const byName = new Map<string, NamedType>()
  const byCtor = new Map<unknown, ClassType>()
  for (const type of types) {
    const existing = byName.get(type.name)
    if (existing !== undefined && existing !== type) {
      return Either.left(typeTableError(type.name))
    }
    byName.set(type.name, type)
    if (type._tag === "Class") {
      byCtor.set(type.ctor, type)
    }
  }
  return Either.right({
    lookup: (name) => Option.fromNullable(byName.get(name)),
    byConstructor: (ctor) => Option.fromNullable(byCtor.get(ctor)),
    names: [...byName.keys()]
  })
}

export const emptyTypeTable: TypeTable = {
  lookup: () => Option.none(),
  byConstructor: () => Option.none(),
  names: []
}
