import { Console, Effect, Either, pipe } from "effect"

import { type DeployError, describeDeployError, isOperatorStop } from "../core/errors.js"
import { type DeployEnv, type DeployOutcome, runDeploy } from "../shell/deploy/index.js"
import { RuntimeEnv } from "../shell/services/runtime-env.js"

/**
 * Maps the deploy result to the process exit code.
 *
 * @pure true
 * @invariant 0 iff the run completed or the operator chose exit
 */
export const exitCodeFor = (result: Either.Either<DeployOutcome, DeployError>): number =>
  Either.isRight(result) ? 0 : 1

export const INTERRUPTED_EXIT_CODE = 1

const reportDeployError = (error: DeployError): Effect.Effect<void> =>
  isOperatorStop(error)
    ? Console.log(describeDeployError(error))
    : Console.error(describeDeployError(error))

const setExitCode = (code: number): Effect.Effect<void, never, RuntimeEnv> =>
  Effect.flatMap(RuntimeEnv, (env) => env.setExitCode(code))

/**
 * The interactive deploy tool as a single effect that never fails:
 * every DeployError is reported once and turned into exit code 1.
 *
 * @effect RuntimeEnv, FileSystemService, RemoteShell, Rsync, Prompt, Path
 * @invariant an interrupted run (Ctrl+C, SIGTERM) leaves exit code 1
 */
export const program: Effect.Effect<void, never, DeployEnv> = pipe(
  runDeploy,
  Effect.tapError(reportDeployError),
  Effect.either,
  Effect.map(exitCodeFor),
  Effect.flatMap(setExitCode),
  Effect.onInterrupt(() => setExitCode(INTERRUPTED_EXIT_CODE))
)
