import * as readline from "node:readline"

import { Context, Effect, Layer, Option, pipe, Queue, type Scope } from "effect"

import type { PromptFailure } from "../../core/errors.js"
import { isAffirmative } from "../../core/menu.js"

export interface PromptService {
  readonly ask: (question: string) => Effect.Effect<string, PromptFailure>
  readonly confirm: (question: string) => Effect.Effect<boolean, PromptFailure>
}

export class Prompt extends Context.Tag("Prompt")<Prompt, PromptService>() {}

// none marks end of input and is put back so later reads see it too
const nextLine = (lines: Queue.Queue<Option.Option<string>>): Effect.Effect<string> =>
  pipe(
    Queue.take(lines),
    Effect.flatMap(Option.match({
      onNone: () => Effect.as(Queue.offer(lines, Option.none()), ""),
      onSome: (line) => Effect.succeed(line)
    }))
  )

// FORMAT THEOREM: forall input: lines(input) = answers(ask*) ++ repeat("")
// PURITY: SHELL
// EFFECT: Effect<PromptService, never, Scope>
// INVARIANT: one readline interface per scope; lines buffered ahead of a question are kept
// INVARIANT: end of input answers "" to every pending and later question
// COMPLEXITY: O(1)/O(l) per answer, l = buffered lines
export const makeLinePrompt = (
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Effect.Effect<PromptService, never, Scope.Scope> =>
  Effect.gen(function*(_) {
    const lines = yield* _(Queue.unbounded<Option.Option<string>>())
    yield* _(
      Effect.acquireRelease(
        Effect.sync(() => {
          const reader = readline.createInterface({ input, terminal: false })
          reader.on("line", (line) => Queue.unsafeOffer(lines, Option.some(line)))
          reader.on("close", () => Queue.unsafeOffer(lines, Option.none()))
          return reader
        }),
        (reader) => Effect.sync(() => reader.close())
      )
    )

    const ask = (question: string): Effect.Effect<string, PromptFailure> =>
      pipe(
        Effect.sync(() => output.write(question)),
        Effect.zipRight(nextLine(lines))
      )

    const confirm = (question: string): Effect.Effect<boolean, PromptFailure> =>
      Effect.map(ask(question), isAffirmative)

    return { ask, confirm }
  })

export const linePromptLayer = (
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Layer.Layer<Prompt> => Layer.scoped(Prompt, makeLinePrompt(input, output))

/**
 * Single-line answers read from stdin for the lifetime of the program.
 *
 * @invariant Ctrl+D or a closed stdin yields an empty answer, which every confirmation treats as "no"
 */
export const PromptLive: Layer.Layer<Prompt> = Layer.suspend(() => linePromptLayer(process.stdin, process.stdout))
