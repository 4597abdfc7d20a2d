import * as Either from "effect/Either"

import type { CerealError, PathSegment } from "../errors.js"
import { atPath } from "../errors.js"

// CHANGE: share the short-circuiting walk used by container converters
// WHY: nested failures must abort and report where they happened
// QUOTE(TZ): n/a
// REF: req-traverse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀xs: traverse(xs, f) = Right(ys) → |ys| = |xs|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: first Left wins and carries its index or key in the path
// COMPLEXITY: O(n)

export const traverseIndexed = <A, B>(
  items: Iterable<A>,
  convert: (item: A) => Either.Either<B, CerealError>
): Either.Either<Array<B>, CerealError> => {
  const result: Array<B> = []
  let index = 0
  for (const item of items) {
    const converted = convert(item)
    if (Either.isLeft(converted)) {
      return Either.left(atPath(index)(converted.left))
    }
    result.push(converted.right)
    index += 1
  }
  return Either.right(result)
}

export const traverseEntries = <A, B>(
  entries: Iterable<readonly [string, A]>,
  convert: (item: A, key: string) => Either.Either<B, CerealError>
): Either.Either<Array<readonly [string, B]>, CerealError> => {
  const result: Array<readonly [string, B]> = []
  for (const [key, item] of entries) {
    const converted = convert(item, key)
    if (Either.isLeft(converted)) {
      const segment: PathSegment = key
      return Either.left(atPath(segment)(converted.left))
    }
    result.push([key, converted.right])
  }
  return Either.right(result)
}
