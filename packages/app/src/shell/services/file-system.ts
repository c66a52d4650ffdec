import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { Context, Effect, Layer, pipe } from "effect"

import { type FileSystemError, fileSystemError } from "../../core/errors.js"

export interface DirectoryEntry {
  readonly name: string
  readonly path: string
}

export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readFileString: (pathValue: string) => Effect.Effect<string, FileSystemError>
    readonly readDirectory: (
      pathValue: string
    ) => Effect.Effect<ReadonlyArray<DirectoryEntry>, FileSystemError>
    readonly makeDirectory: (pathValue: string) => Effect.Effect<void, FileSystemError>
    readonly copyTree: (
      sourcePath: string,
      destinationPath: string
    ) => Effect.Effect<void, FileSystemError>
    readonly exists: (pathValue: string) => Effect.Effect<boolean, FileSystemError>
  }
>() {}

// FORMAT THEOREM: forall d: readDirectory(d) = { (n, d/n) | n in list(d) }
// PURITY: SHELL
// EFFECT: Effect<FileSystemService, never, FileSystem | Path>
// INVARIANT: readDirectory returns absolute entry paths without touching the entries
// INVARIANT: copyTree copies directories recursively
// COMPLEXITY: O(n)/O(n)
export const FileSystemLive = Layer.effect(
  FileSystemService,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)

    const readFileString = (pathValue: string): Effect.Effect<string, FileSystemError> =>
      pipe(
        fs.readFileString(pathValue, "utf8"),
        Effect.mapError(() => fileSystemError(pathValue, "Cannot read file"))
      )

    const readDirectory = (
      pathValue: string
    ): Effect.Effect<ReadonlyArray<DirectoryEntry>, FileSystemError> =>
      pipe(
        fs.readDirectory(pathValue),
        Effect.map((names) => names.map((name) => ({ name, path: path.join(pathValue, name) }))),
        Effect.mapError(() => fileSystemError(pathValue, "Cannot read directory"))
      )

    const makeDirectory = (pathValue: string): Effect.Effect<void, FileSystemError> =>
      pipe(
        fs.makeDirectory(pathValue, { recursive: true }),
        Effect.mapError(() => fileSystemError(pathValue, "Cannot create directory"))
      )

    const copyTree = (
      sourcePath: string,
      destinationPath: string
    ): Effect.Effect<void, FileSystemError> =>
      pipe(
        fs.copy(sourcePath, destinationPath),
        Effect.mapError(() => fileSystemError(sourcePath, "Cannot copy into destination"))
      )

    const exists = (pathValue: string): Effect.Effect<boolean, FileSystemError> =>
      pipe(
        fs.exists(pathValue),
        Effect.mapError(() => fileSystemError(pathValue, "Cannot check path existence"))
      )

    return {
      readFileString,
      readDirectory,
      makeDirectory,
      copyTree,
      exists
    }
  })
)
