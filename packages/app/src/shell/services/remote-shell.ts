import * as Command from "@effect/platform/Command"
import * as CommandExecutor from "@effect/platform/CommandExecutor"
import { Context, Effect, Layer, pipe } from "effect"

import { type ToolFailure, toolFailure } from "../../core/errors.js"
import { buildDirectoryTestArgs, buildProbeArgs } from "../../core/ssh.js"

export class RemoteShell extends Context.Tag("RemoteShell")<
  RemoteShell,
  {
    readonly probe: (host: string) => Effect.Effect<void, ToolFailure>
    readonly directoryExists: (host: string, remotePath: string) => Effect.Effect<boolean, ToolFailure>
  }
>() {}

// FORMAT THEOREM: forall host: probe(host) succeeds <-> exitCode(ssh probeArgs(host)) = 0
// PURITY: SHELL
// EFFECT: Effect<RemoteShell service, never, CommandExecutor>
// INVARIANT: probe fails on a non-zero exit or when the client cannot be spawned
// INVARIANT: directoryExists maps exit 0 to true and any other exit to false
// COMPLEXITY: O(1)/O(1) per call
export const makeRemoteShell = (
  binary: string
): Effect.Effect<Context.Tag.Service<RemoteShell>, never, CommandExecutor.CommandExecutor> =>
  Effect.gen(function*(_) {
    const executor = yield* _(CommandExecutor.CommandExecutor)

    const runSsh = (args: ReadonlyArray<string>): Effect.Effect<number, ToolFailure> =>
      pipe(
        executor.exitCode(Command.make(binary, ...args)),
        Effect.map((exitCode) => Number(exitCode)),
        Effect.mapError((error) => toolFailure("ssh", error.message))
      )

    const probe = (host: string): Effect.Effect<void, ToolFailure> =>
      pipe(
        runSsh(buildProbeArgs(host)),
        Effect.flatMap((exitCode) =>
          exitCode === 0
            ? Effect.void
            : Effect.fail(toolFailure("ssh", `exited with code ${exitCode}`))
        )
      )

    const directoryExists = (host: string, remotePath: string): Effect.Effect<boolean, ToolFailure> =>
      Effect.map(runSsh(buildDirectoryTestArgs(host, remotePath)), (exitCode) => exitCode === 0)

    return { probe, directoryExists }
  })

export const RemoteShellLive = Layer.effect(RemoteShell, makeRemoteShell("ssh"))
