import type * as Path from "@effect/platform/Path"
import { Console, Effect, Match, Option } from "effect"

import type { DeployConfig } from "../../core/config.js"
import { type DeployError, invalidMenuChoice, type InvalidMenuChoice, type PromptFailure } from "../../core/errors.js"
import { MENU_PROMPT, type MenuChoice, parseMenuChoice, renderMenu } from "../../core/menu.js"
import type { FileSystemService } from "../services/file-system.js"
import { Prompt } from "../services/prompt.js"
import type { RemoteShell } from "../services/remote-shell.js"
import type { Rsync } from "../services/rsync.js"
import type { RuntimeEnv } from "../services/runtime-env.js"
import { loadDeployConfig } from "./config.js"
import { verifyRemote } from "./connectivity.js"
import { type OperationEnv, previewAll, pullContent, pushCodebase, pushContent } from "./operations.js"

export type DeployEnv = RuntimeEnv | FileSystemService | RemoteShell | Rsync | Prompt | Path.Path

export type DeployOutcome = "completed" | "exited"

const chooseOperation: Effect.Effect<MenuChoice, InvalidMenuChoice | PromptFailure, Prompt> = Effect.gen(
  function*(_) {
    const prompt = yield* _(Prompt)
    yield* _(Effect.forEach(renderMenu(), (line) => Console.log(line), { discard: true }))
    const input = yield* _(prompt.ask(MENU_PROMPT))
    const choice = parseMenuChoice(input)
    if (Option.isNone(choice)) {
      return yield* _(Effect.fail(invalidMenuChoice(input)))
    }
    return choice.value
  }
)

const completed = <E, R>(operation: Effect.Effect<void, E, R>): Effect.Effect<DeployOutcome, E, R> =>
  Effect.gen(function*(_) {
    yield* _(operation)
    yield* _(Console.log("Done!"))
    return "completed" as const
  })

const dispatch = (
  config: DeployConfig,
  choice: MenuChoice
): Effect.Effect<DeployOutcome, DeployError, OperationEnv> =>
  Match.value(choice).pipe(
    Match.when("pull-content", () => completed(pullContent(config))),
    Match.when("push-codebase", () => completed(pushCodebase(config))),
    Match.when("push-content", () => completed(pushContent(config))),
    Match.when("preview-all", () => completed(previewAll(config))),
    Match.when("exit", () => Effect.as(Console.log("Goodbye!"), "exited" as const)),
    Match.exhaustive
  )

// FORMAT THEOREM: forall run: runDeploy = load >> verify >> choose >> dispatch
// PURITY: SHELL
// EFFECT: Effect<DeployOutcome, DeployError, DeployEnv>
// INVARIANT: no remote command runs before the configuration is valid
// INVARIANT: at most one menu operation runs per invocation
// COMPLEXITY: O(1)/O(1)
export const runDeploy: Effect.Effect<DeployOutcome, DeployError, DeployEnv> = Effect.gen(function*(_) {
  const config = yield* _(loadDeployConfig)
  yield* _(verifyRemote(config))
  const choice = yield* _(chooseOperation)
  return yield* _(dispatch(config, choice))
})
