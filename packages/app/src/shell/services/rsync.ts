import * as Command from "@effect/platform/Command"
import * as CommandExecutor from "@effect/platform/CommandExecutor"
import { Context, Effect, Layer, pipe } from "effect"

import { type ToolFailure, toolFailure } from "../../core/errors.js"
import { buildRsyncArgs, type TransferMode, type TransferPlan } from "../../core/plan.js"
import { RuntimeEnv } from "./runtime-env.js"

export class Rsync extends Context.Tag("Rsync")<
  Rsync,
  {
    readonly dryRun: (plan: TransferPlan) => Effect.Effect<void, ToolFailure>
    readonly transfer: (plan: TransferPlan) => Effect.Effect<void, ToolFailure>
  }
>() {}

/**
 * Runs `rsync` in the working directory with its output attached to ours,
 * so itemized changes and progress reach the operator unchanged.
 *
 * @effect CommandExecutor, RuntimeEnv
 * @invariant dryRun and transfer render the same plan, differing only in mode flags
 * @invariant any non-zero exit is a ToolFailure
 */
export const makeRsync = (
  binary: string
): Effect.Effect<Context.Tag.Service<Rsync>, never, CommandExecutor.CommandExecutor | RuntimeEnv> =>
  Effect.gen(function*(_) {
    const executor = yield* _(CommandExecutor.CommandExecutor)
    const env = yield* _(RuntimeEnv)
    const cwd = yield* _(env.cwd)

    const run = (plan: TransferPlan, mode: TransferMode): Effect.Effect<void, ToolFailure> =>
      pipe(
        Command.make(binary, ...buildRsyncArgs(plan, mode)),
        Command.workingDirectory(cwd),
        Command.stdout("inherit"),
        Command.stderr("inherit"),
        (command) => executor.exitCode(command),
        Effect.mapError((error) => toolFailure("rsync", error.message)),
        Effect.flatMap((exitCode) =>
          Number(exitCode) === 0
            ? Effect.void
            : Effect.fail(toolFailure("rsync", `exited with code ${exitCode}`))
        )
      )

    return {
      dryRun: (plan: TransferPlan) => run(plan, "preview"),
      transfer: (plan: TransferPlan) => run(plan, "execute")
    }
  })

export const RsyncLive = Layer.effect(Rsync, makeRsync("rsync"))
