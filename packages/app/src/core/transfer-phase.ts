import { Match, Option } from "effect"

export type TransferPhase =
  | "Idle"
  | "PreviewRequested"
  | "PreviewShown"
  | "Confirmed"
  | "Cancelled"
  | "Executing"
  | "Completed"
  | "Failed"

export type TransferEvent =
  | { readonly _tag: "PlanSubmitted" }
  | { readonly _tag: "PreviewSucceeded" }
  | { readonly _tag: "PreviewFailed"; readonly reason: string }
  | { readonly _tag: "Answered"; readonly confirmed: boolean }
  | { readonly _tag: "ExecutionStarted" }
  | { readonly _tag: "TransferSucceeded" }
  | { readonly _tag: "TransferFailed"; readonly reason: string }

const terminalPhases: ReadonlySet<TransferPhase> = new Set(["Cancelled", "Completed", "Failed"])

// PURITY: CORE
// INVARIANT: isTerminalPhase(p) <-> advance(p, e) = none for every e
export const isTerminalPhase = (phase: TransferPhase): boolean => terminalPhases.has(phase)

const acceptOnly = (
  event: TransferEvent,
  transitions: Partial<Record<TransferEvent["_tag"], TransferPhase>>
): Option.Option<TransferPhase> => Option.fromNullable(transitions[event._tag])

/**
 * Transition function of the preview-confirm-execute workflow.
 *
 * @returns The next phase, or none when the event is not accepted in `phase`.
 *
 * @pure true
 * @invariant Executing is reachable only through PreviewShown and a confirmed answer
 * @invariant terminal phases accept no event
 */
export const advance = (phase: TransferPhase, event: TransferEvent): Option.Option<TransferPhase> =>
  Match.value(phase).pipe(
    Match.when("Idle", () => acceptOnly(event, { PlanSubmitted: "PreviewRequested" })),
    Match.when("PreviewRequested", () => acceptOnly(event, { PreviewSucceeded: "PreviewShown", PreviewFailed: "Failed" })),
    Match.when("PreviewShown", () =>
      event._tag === "Answered"
        ? Option.some<TransferPhase>(event.confirmed ? "Confirmed" : "Cancelled")
        : Option.none()),
    Match.when("Confirmed", () => acceptOnly(event, { ExecutionStarted: "Executing" })),
    Match.when("Executing", () => acceptOnly(event, { TransferSucceeded: "Completed", TransferFailed: "Failed" })),
    Match.when("Cancelled", () => Option.none()),
    Match.when("Completed", () => Option.none()),
    Match.when("Failed", () => Option.none()),
    Match.exhaustive
  )
