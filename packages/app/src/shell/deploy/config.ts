import * as Path from "@effect/platform/Path"
import { Effect, Either, Option, pipe } from "effect"

import { type DeployConfig, ENV_FILE_NAME, parseEnvFile, resolveDeployConfig } from "../../core/config.js"
import { type ConfigurationMissing, configurationMissing } from "../../core/errors.js"
import { FileSystemService } from "../services/file-system.js"
import { RuntimeEnv } from "../services/runtime-env.js"

const fileMissing = configurationMissing(ENV_FILE_NAME, Option.none())

// FORMAT THEOREM: forall env: load(env) = resolveDeployConfig(parseEnvFile(env))
// PURITY: SHELL
// EFFECT: Effect<DeployConfig, ConfigurationMissing, RuntimeEnv | FileSystemService | Path>
// INVARIANT: fails before any remote contact when a required key is missing or empty
// COMPLEXITY: O(n)/O(n)
export const loadDeployConfig: Effect.Effect<
  DeployConfig,
  ConfigurationMissing,
  RuntimeEnv | FileSystemService | Path.Path
> = Effect.gen(function*(_) {
  const env = yield* _(RuntimeEnv)
  const fs = yield* _(FileSystemService)
  const path = yield* _(Path.Path)
  const envFile = path.join(yield* _(env.cwd), ENV_FILE_NAME)

  const present = yield* _(pipe(fs.exists(envFile), Effect.mapError(() => fileMissing)))
  if (!present) {
    return yield* _(Effect.fail(fileMissing))
  }

  const content = yield* _(pipe(fs.readFileString(envFile), Effect.mapError(() => fileMissing)))
  return yield* _(
    Either.match(resolveDeployConfig(parseEnvFile(content)), {
      onLeft: (key) => Effect.fail(configurationMissing(ENV_FILE_NAME, Option.some(key))),
      onRight: (config) => Effect.succeed(config)
    })
  )
})
