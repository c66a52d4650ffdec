import * as Path from "@effect/platform/Path"
import { Clock, Console, Effect, Option, pipe } from "effect"

import { BACKUPS_ROOT, backupDirectoryName } from "../../core/backup.js"
import { type BackupFailure, backupFailure } from "../../core/errors.js"
import { FileSystemService } from "../services/file-system.js"

const snapshot = (
  cwd: string,
  label: string
): Effect.Effect<Option.Option<string>, BackupFailure, FileSystemService | Path.Path> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    const path = yield* _(Path.Path)
    const sourceDir = path.join(cwd, label)
    const toBackupFailure = (error: { readonly path: string; readonly reason: string }) =>
      backupFailure(error.path, error.reason)

    const present = yield* _(pipe(fs.exists(sourceDir), Effect.mapError(toBackupFailure)))
    if (!present) {
      return Option.none()
    }

    const now = new Date(yield* _(Clock.currentTimeMillis))
    const backupDir = path.join(cwd, BACKUPS_ROOT, backupDirectoryName(now, label))
    yield* _(pipe(fs.makeDirectory(backupDir), Effect.mapError(toBackupFailure)))
    const entries = yield* _(pipe(fs.readDirectory(sourceDir), Effect.mapError(toBackupFailure)))
    yield* _(
      Effect.forEach(entries, (entry) =>
        pipe(
          fs.copyTree(entry.path, path.join(backupDir, entry.name)),
          Effect.mapError(toBackupFailure)
        ))
    )
    return Option.some(path.relative(cwd, backupDir))
  })

// FORMAT THEOREM: forall e in cwd/label: copied(e, backups/<stamp>_label/e)
// PURITY: SHELL
// EFFECT: Effect<void, never, FileSystemService | Path>
// INVARIANT: never fails; a BackupFailure is reported as a warning and the caller proceeds
// INVARIANT: nothing is written when the labelled directory does not exist
// COMPLEXITY: O(n)/O(1)
export const createBackup = (
  cwd: string,
  label: string
): Effect.Effect<void, never, FileSystemService | Path.Path> =>
  pipe(
    snapshot(cwd, label),
    Effect.matchEffect({
      onFailure: () => Console.log("Warning: Failed to create backup. Continuing anyway..."),
      onSuccess: (created) =>
        Option.match(created, {
          onNone: () => Effect.void,
          onSome: (backupDir) => Console.log(`Local ${label} backed up to ${backupDir}`)
        })
    })
  )
