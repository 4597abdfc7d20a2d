import * as Either from "effect/Either"

import type { Cerealizer } from "../cerealizer.js"
import type { DateFormat } from "../config.js"
import type { CerealError } from "../errors.js"
import { malformedScalar, typeMismatch } from "../errors.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric } from "../generic.js"
import { describeInstance } from "./scalar.js"

// CHANGE: convert Date instances to ISO-8601 text or epoch milliseconds
// WHY: temporal values are a fixed leaf registered at construction
// QUOTE(TZ): "Temporal (date/time)"
// REF: req-leaf-temporal-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d valid: fromGeneric(toGeneric(d)).getTime() = d.getTime()
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: reading accepts both formats regardless of the write format
// COMPLEXITY: O(1)/O(1)

const checkValid = (date: Date): Either.Either<Date, CerealError> =>
  Number.isNaN(date.getTime()) ? Either.left(malformedScalar("invalid date")) : Either.right(date)

export class DateCerealizer implements Cerealizer {
  constructor(private readonly format: DateFormat = "iso") {}

  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    if (!(instance instanceof Date)) {
      return Either.left(typeMismatch(`expected Date, got ${describeInstance(instance)}`))
    }
    return Either.map(
      checkValid(instance),
      (date): GenericValue => this.format === "epoch" ? date.getTime() : date.toISOString()
    )
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    if (typeof value === "string" || typeof value === "number") {
      return checkValid(new Date(value))
    }
    return Either.left(typeMismatch(`expected date text or epoch millis, got ${describeGeneric(value)}`))
  }
}
