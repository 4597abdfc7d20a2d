import * as Either from "effect/Either"

import type { Cerealizer } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { malformedScalar, typeMismatch } from "../errors.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric } from "../generic.js"
import type { EnumType } from "../type-descriptor.js"
import { describeInstance } from "./scalar.js"

// CHANGE: bind a converter to one enumeration descriptor
// WHY: members travel as their string value and are checked on both paths
// QUOTE(TZ): "Enumeration (bound to one concrete enumeration type)"
// REF: req-enum-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m ∈ members: fromGeneric(toGeneric(m)) = m
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only declared members are produced
// COMPLEXITY: O(1)/O(1)

export class EnumCerealizer implements Cerealizer {
  private readonly members: ReadonlySet<string>

  constructor(readonly type: EnumType) {
    this.members = new Set(type.members)
  }

  private check(value: string): Either.Either<string, CerealError> {
    return this.members.has(value)
      ? Either.right(value)
      : Either.left(malformedScalar(`${JSON.stringify(value)} is not a member of ${this.type.name}`))
  }

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return typeof instance === "string"
      ? this.check(instance)
      : Either.left(typeMismatch(`expected ${this.type.name}, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    return typeof value === "string"
      ? this.check(value)
      : Either.left(typeMismatch(`expected ${this.type.name}, got ${describeGeneric(value)}`))
  }
}
