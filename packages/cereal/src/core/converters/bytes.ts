import * as Either from "effect/Either"
import * as Encoding from "effect/Encoding"

import type { Cerealizer } from "../cerealizer.js"
import type { CerealError } from "../errors.js"
import { malformedScalar, typeMismatch } from "../errors.js"
import type { GenericValue } from "../generic.js"
import { describeGeneric } from "../generic.js"
import { describeInstance } from "./scalar.js"

// CHANGE: carry byte sequences as base64 text
// WHY: the generic representation has no binary scalar
// QUOTE(TZ): "return the single shared byte-sequence converter"
// REF: req-leaf-bytes-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: decode(encode(b)) = b
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: one instance lives in the factory instance cache
// COMPLEXITY: O(n)/O(n)

export class BytesCerealizer implements Cerealizer {
  toGeneric(instance: unknown): Either.Either<GenericValue, CerealError> {
    return instance instanceof Uint8Array
      ? Either.right(Encoding.encodeBase64(instance))
      : Either.left(typeMismatch(`expected Uint8Array, got ${describeInstance(instance)}`))
  }

  fromGeneric(value: GenericValue): Either.Either<unknown, CerealError> {
    if (typeof value !== "string") {
      return Either.left(typeMismatch(`expected base64 text, got ${describeGeneric(value)}`))
    }
    return Either.mapLeft(
      Encoding.decodeBase64(value),
      (error) => malformedScalar(`invalid base64: ${error.message}`)
    )
  }
}
