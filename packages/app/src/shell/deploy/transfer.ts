import { Console, Effect, Match, Option, pipe } from "effect"

import {
  type DryRunFailure,
  dryRunFailure,
  type OperationCancelled,
  operationCancelled,
  type PromptFailure,
  type TransferFailure,
  transferFailure
} from "../../core/errors.js"
import type { TransferPlan } from "../../core/plan.js"
import { advance, isTerminalPhase, type TransferEvent, type TransferPhase } from "../../core/transfer-phase.js"
import { Prompt } from "../services/prompt.js"
import { Rsync } from "../services/rsync.js"

type TransferError = DryRunFailure | TransferFailure | OperationCancelled | PromptFailure
type TransferEnv = Rsync | Prompt

interface TransferRun {
  readonly phase: TransferPhase
  readonly last: Option.Option<TransferEvent>
}

const announce = (plan: TransferPlan): Effect.Effect<TransferEvent> =>
  Effect.gen(function*(_) {
    yield* _(Console.log(""))
    yield* _(Console.log("=== DRY RUN - Showing what would change ==="))
    yield* _(Console.log(`Source: ${plan.source}`))
    yield* _(Console.log(`Destination: ${plan.destination}`))
    if (plan.deleteExtraneous) {
      yield* _(Console.log("WARNING: --delete flag will remove files that don't exist in source!"))
    }
    yield* _(Console.log(""))
    return { _tag: "PlanSubmitted" } as const
  })

const preview = (plan: TransferPlan): Effect.Effect<TransferEvent, never, Rsync> =>
  Effect.flatMap(Rsync, (rsync) =>
    pipe(
      rsync.dryRun(plan),
      Effect.match({
        onFailure: (error): TransferEvent => ({ _tag: "PreviewFailed", reason: error.reason }),
        onSuccess: (): TransferEvent => ({ _tag: "PreviewSucceeded" })
      })
    ))

const askToProceed: Effect.Effect<TransferEvent, PromptFailure, Prompt> = Effect.flatMap(
  Prompt,
  (prompt) =>
    pipe(
      Console.log(""),
      Effect.zipRight(prompt.confirm("Proceed with these changes? (y/N): ")),
      Effect.map((confirmed): TransferEvent => ({ _tag: "Answered", confirmed }))
    )
)

const execute = (plan: TransferPlan): Effect.Effect<TransferEvent, never, Rsync> =>
  Effect.flatMap(Rsync, (rsync) =>
    pipe(
      rsync.transfer(plan),
      Effect.match({
        onFailure: (error): TransferEvent => ({ _tag: "TransferFailed", reason: error.reason }),
        onSuccess: (): TransferEvent => ({ _tag: "TransferSucceeded" })
      })
    ))

// Effect performed on entering each non-terminal phase; its result is the next event.
const runPhase = (
  phase: TransferPhase,
  plan: TransferPlan
): Effect.Effect<TransferEvent, PromptFailure, TransferEnv> =>
  Match.value(phase).pipe(
    Match.when("Idle", () => announce(plan)),
    Match.when("PreviewRequested", () => preview(plan)),
    Match.when("PreviewShown", () => askToProceed),
    Match.when("Confirmed", () =>
      Effect.as(Console.log("Executing rsync..."), { _tag: "ExecutionStarted" } as const)),
    Match.when("Executing", () => execute(plan)),
    Match.orElse((terminal) => Effect.dieMessage(`No action for terminal phase ${terminal}`))
  )

const walk = (
  plan: TransferPlan,
  run: TransferRun
): Effect.Effect<TransferRun, PromptFailure, TransferEnv> =>
  isTerminalPhase(run.phase)
    ? Effect.succeed(run)
    : Effect.gen(function*(_) {
      const event = yield* _(runPhase(run.phase, plan))
      const next = advance(run.phase, event)
      if (Option.isNone(next)) {
        return yield* _(Effect.dieMessage(`${event._tag} is not accepted in phase ${run.phase}`))
      }
      return yield* _(walk(plan, { phase: next.value, last: Option.some(event) }))
    })

const failureOf = (last: Option.Option<TransferEvent>): DryRunFailure | TransferFailure =>
  Option.match(last, {
    onNone: () => transferFailure("transfer ended without a result"),
    onSome: (event) =>
      event._tag === "PreviewFailed" ? dryRunFailure(event.reason) : transferFailure(
        event._tag === "TransferFailed" ? event.reason : `unexpected ${event._tag}`
      )
  })

/**
 * Preview, confirm, then execute one transfer plan.
 *
 * @param plan - Passed unchanged to both the dry run and the real transfer.
 *
 * @effect Rsync, Prompt
 * @invariant the real transfer runs only after a successful preview and an affirmative answer
 * @invariant a declined answer fails with OperationCancelled
 */
export const safeTransfer = (
  plan: TransferPlan
): Effect.Effect<void, TransferError, TransferEnv> =>
  Effect.gen(function*(_) {
    const finished = yield* _(walk(plan, { phase: "Idle", last: Option.none() }))
    if (finished.phase === "Completed") {
      yield* _(Console.log("Sync completed successfully"))
      return
    }
    if (finished.phase === "Cancelled") {
      return yield* _(Effect.fail(operationCancelled))
    }
    return yield* _(Effect.fail(failureOf(finished.last)))
  })
