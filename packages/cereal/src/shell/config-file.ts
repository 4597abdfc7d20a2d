import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .cereal.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): n/a
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined unless the path was explicit
// COMPLEXITY: O(n)

export const defaultConfigPath = "./.cereal.json"

const RawConfigSchema = S.partial(
  S.Struct({
    emitDiscriminator: S.Boolean,
    dateFormat: S.Literal("iso", "epoch"),
    logLevel: S.Literal("All", "Trace", "Debug", "Info", "Warning", "Error", "Fatal", "None")
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.emitDiscriminator === undefined ? {} : { emitDiscriminator: config.emitDiscriminator }),
      ...(config.dateFormat === undefined ? {} : { dateFormat: config.dateFormat }),
      ...(config.logLevel === undefined ? {} : { logLevel: config.logLevel })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const target = path ?? defaultConfigPath
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(target).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${target}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(target).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
