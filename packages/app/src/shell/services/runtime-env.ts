import { Context, Effect, Layer } from "effect"

export class RuntimeEnv extends Context.Tag("RuntimeEnv")<
  RuntimeEnv,
  {
    readonly cwd: Effect.Effect<string>
    readonly setExitCode: (code: number) => Effect.Effect<void>
  }
>() {}

const readProcess = (): NodeJS.Process | undefined => typeof process === "undefined" ? undefined : process

// PURITY: SHELL
// EFFECT: Layer<RuntimeEnv>
// INVARIANT: setExitCode never terminates the process; the runtime exits once the program completes
export const RuntimeEnvLive = Layer.succeed(RuntimeEnv, {
  cwd: Effect.sync(() => readProcess()?.cwd() ?? "."),
  setExitCode: (code) =>
    Effect.sync(() => {
      const proc = readProcess()
      if (proc !== undefined) {
        proc.exitCode = code
      }
    })
})
