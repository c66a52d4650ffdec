import type * as Path from "@effect/platform/Path"
import { Console, Effect, pipe } from "effect"

import type { DeployConfig } from "../../core/config.js"
import type { DryRunFailure, OperationCancelled, PromptFailure, TransferFailure } from "../../core/errors.js"
import { pullContentPlan, pushCodebasePlan, pushContentPlan, type TransferPlan } from "../../core/plan.js"
import type { FileSystemService } from "../services/file-system.js"
import { Prompt } from "../services/prompt.js"
import { Rsync } from "../services/rsync.js"
import { RuntimeEnv } from "../services/runtime-env.js"
import { createBackup } from "./backup.js"
import { safeTransfer } from "./transfer.js"

export type OperationError = DryRunFailure | TransferFailure | OperationCancelled | PromptFailure
export type OperationEnv = Rsync | Prompt | RuntimeEnv | FileSystemService | Path.Path

const CONTENT_LABEL = "content"

// PURITY: SHELL
// EFFECT: Effect<void, OperationError, OperationEnv>
// INVARIANT: the backup is attempted before the preview
export const pullContent = (
  config: DeployConfig
): Effect.Effect<void, OperationError, OperationEnv> =>
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    yield* _(Console.log(""))
    yield* _(Console.log("Pulling content from remote..."))
    yield* _(createBackup(yield* _(env.cwd), CONTENT_LABEL))
    yield* _(safeTransfer(pullContentPlan(config)))
  })

// PURITY: SHELL
// EFFECT: Effect<void, OperationError, Rsync | Prompt>
// INVARIANT: never sets the delete flag
export const pushCodebase = (
  config: DeployConfig
): Effect.Effect<void, OperationError, Rsync | Prompt> =>
  Effect.gen(function*(_) {
    yield* _(Console.log(""))
    yield* _(Console.log("Pushing codebase to remote..."))
    yield* _(Console.log("WARNING: This will overwrite code on the remote server"))
    yield* _(safeTransfer(pushCodebasePlan(config)))
  })

/**
 * Pushes local content, optionally previewing a pull first and optionally mirroring with --delete.
 *
 * @effect Rsync, Prompt
 * @invariant the delete flag is set only after an explicit "y" at the mirror prompt
 * @invariant a cancelled or failed conflict check ends the operation before the push
 */
export const pushContent = (
  config: DeployConfig
): Effect.Effect<void, OperationError, Rsync | Prompt> =>
  Effect.gen(function*(_) {
    const prompt = yield* _(Prompt)
    yield* _(Console.log(""))
    yield* _(Console.log("Pushing content to remote..."))

    const checkFirst = yield* _(prompt.confirm("Pull remote content first to check for conflicts? (y/N): "))
    if (checkFirst) {
      yield* _(Console.log("Checking remote content..."))
      yield* _(safeTransfer(pullContentPlan(config)))
    }

    yield* _(Console.log(""))
    yield* _(Console.log("IMPORTANT: Should files that exist on remote but not locally be deleted?"))
    yield* _(Console.log("   Choose 'y' for exact mirror (removes remote-only files)"))
    yield* _(Console.log("   Choose 'n' to only add/update files (safer)"))
    const mirror = yield* _(prompt.confirm("Use --delete flag? (y/N): "))

    yield* _(safeTransfer(pushContentPlan(config, mirror)))
  })

const previewSection = (
  title: string,
  plan: TransferPlan,
  fallback: string
): Effect.Effect<void, never, Rsync> =>
  Effect.gen(function*(_) {
    const rsync = yield* _(Rsync)
    yield* _(Console.log(title))
    yield* _(
      pipe(
        rsync.dryRun(plan),
        Effect.catchAll(() => Console.log(fallback))
      )
    )
  })

// FORMAT THEOREM: forall c: previewAll(c) runs dryRun only
// PURITY: SHELL
// EFFECT: Effect<void, never, Rsync>
// INVARIANT: never transfers and never fails on a preview error
// COMPLEXITY: O(1)/O(1)
export const previewAll = (
  config: DeployConfig
): Effect.Effect<void, never, Rsync> =>
  Effect.gen(function*(_) {
    yield* _(Console.log(""))
    yield* _(Console.log("=== STATUS CHECK - What's different between local and remote ==="))
    yield* _(Console.log(""))
    yield* _(
      previewSection(
        "Codebase differences:",
        pushCodebasePlan(config),
        "  (No codebase differences or connection failed)"
      )
    )
    yield* _(Console.log(""))
    yield* _(
      previewSection(
        "Content differences:",
        pushContentPlan(config, false),
        "  (No content differences or connection failed)"
      )
    )
    yield* _(Console.log(""))
    yield* _(Console.log("Legend: '>' = file would be transferred, 'c' = checksum differs, 's' = size differs"))
    yield* _(Console.log("This was just a preview - nothing was actually changed."))
  })
