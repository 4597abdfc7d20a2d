import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Context, Effect, Layer, Logger, LogLevel } from "effect"
import type * as Either from "effect/Either"

import type { EngineOptions, ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError, CerealError } from "../core/errors.js"
import { renderError, typeMismatch } from "../core/errors.js"
import { CerealFactory } from "../core/factory.js"
import type { GenericValue } from "../core/generic.js"
import type { ClassType, TypeDescriptor } from "../core/type-descriptor.js"
import type { TypeTable } from "../core/type-table.js"
import { loadConfigFile } from "./config-file.js"

// CHANGE: expose the factory as an Effect service with logging and config
// WHY: callers compose conversions with other effects and get typed failures
// QUOTE(TZ): n/a
// REF: req-engine-1
// SOURCE: n/a
// FORMAT THEOREM: ∀T,v: decerealize(T, cerealize(T, v)) ≅ v
// PURITY: SHELL
// EFFECT: Effect<A, CerealError, CerealEngine>
// INVARIANT: one factory per built layer
// COMPLEXITY: O(size of the value)

export interface CerealEngineService {
  readonly factory: CerealFactory
  readonly config: ResolvedConfig
}

export class CerealEngine extends Context.Tag("CerealEngine")<CerealEngine, CerealEngineService>() {}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const layerFromConfig = (types: TypeTable, config: ResolvedConfig): Layer.Layer<CerealEngine> =>
  Layer.merge(
    Layer.sync(CerealEngine, () => ({
      factory: new CerealFactory({
        types,
        emitDiscriminator: config.emitDiscriminator,
        dateFormat: config.dateFormat
      }),
      config
    })),
    Logger.minimumLogLevel(LogLevel.fromLiteral(config.logLevel))
  )

export const makeEngineLayer = (
  types: TypeTable,
  options: EngineOptions = {}
): Layer.Layer<CerealEngine> => layerFromConfig(types, resolveConfig(options, undefined))

/**
 * Build the engine layer from a config file merged under explicit options.
 *
 * @param types - Registered types for discriminator lookup.
 * @param configPath - Config file; when given it must exist.
 * @param options - Explicit options, highest precedence.
 *
 * @pure false
 * @effect FileSystem
 * @complexity O(n) in the config size
 */
export const loadEngineLayer = (
  types: TypeTable,
  configPath: string | undefined,
  options: EngineOptions = {}
): Layer.Layer<CerealEngine, AppError, FileSystemService> =>
  Layer.unwrapEffect(
    Effect.gen(function*(_) {
      const fileConfig = yield* _(loadConfigFile(configPath, configPath !== undefined))
      const config = resolveConfig(options, fileConfig)
      yield* _(Effect.logDebug("engine config resolved").pipe(Effect.annotateLogs({ ...config })))
      return layerFromConfig(types, config)
    })
  )

const logFailure = (error: CerealError): Effect.Effect<void> => Effect.logWarning(renderError(error))

export const cerealize = (
  type: TypeDescriptor,
  value: unknown
): Effect.Effect<GenericValue, CerealError, CerealEngine> =>
  Effect.gen(function*(_) {
    const { factory } = yield* _(CerealEngine)
    yield* _(Effect.logDebug("cerealize"))
    const cerealizer = yield* _(fromEither(factory.resolve(type)))
    return yield* _(fromEither(cerealizer.toGeneric(value)))
  }).pipe(
    Effect.tapError(logFailure),
    Effect.annotateLogs({ operation: "cerealize", type: type.name })
  )

export const decerealize = (
  type: TypeDescriptor,
  generic: GenericValue
): Effect.Effect<unknown, CerealError, CerealEngine> =>
  Effect.gen(function*(_) {
    const { factory } = yield* _(CerealEngine)
    yield* _(Effect.logDebug("decerealize"))
    const cerealizer = yield* _(fromEither(factory.resolve(type)))
    return yield* _(fromEither(cerealizer.fromGeneric(generic)))
  }).pipe(
    Effect.tapError(logFailure),
    Effect.annotateLogs({ operation: "decerealize", type: type.name })
  )

/** Decode with the type named by the discriminator, falling back to `fallbackType`. */
export const decerealizeRuntime = (
  generic: GenericValue,
  fallbackType: TypeDescriptor
): Effect.Effect<unknown, CerealError, CerealEngine> =>
  Effect.gen(function*(_) {
    const { factory } = yield* _(CerealEngine)
    yield* _(Effect.logDebug("decerealize runtime"))
    const fallback = yield* _(fromEither(factory.resolve(fallbackType)))
    const cerealizer = yield* _(fromEither(factory.getRuntimeConverter(generic, fallback)))
    return yield* _(fromEither(cerealizer.fromGeneric(generic)))
  }).pipe(
    Effect.tapError(logFailure),
    Effect.annotateLogs({ operation: "decerealizeRuntime", type: fallbackType.name })
  )

export const decerealizeAs = <A extends object>(
  type: ClassType<A>,
  generic: GenericValue
): Effect.Effect<A, CerealError, CerealEngine> =>
  Effect.flatMap(decerealizeRuntime(generic, type), (value) =>
    value instanceof type.ctor
      ? Effect.succeed(value)
      : Effect.fail(typeMismatch(`decoded value is not an instance of ${type.name}`)))
