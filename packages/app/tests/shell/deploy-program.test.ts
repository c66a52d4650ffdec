import { NodeContext } from "@effect/platform-node"
import type * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Either, Fiber, Layer, Option, pipe } from "effect"

import { program } from "../../src/app/program.js"
import type { DeployConfig } from "../../src/core/config.js"
import { type DeployError, describeDeployError, fileSystemError } from "../../src/core/errors.js"
import { buildRsyncArgs, pullContentPlan, pushCodebasePlan, pushContentPlan } from "../../src/core/plan.js"
import { type DeployEnv, runDeploy } from "../../src/shell/deploy/index.js"
import { FileSystemLive, FileSystemService } from "../../src/shell/services/file-system.js"
import { linePromptLayer } from "../../src/shell/services/prompt.js"
import { type HarnessOptions, makeHarness, type ToolCall } from "../support/deploy-harness.js"
import { withFsPath, withTempProject, writeFile } from "../support/fs-helpers.js"
import { captureOutput, endedInput } from "../support/streams.js"

const config: DeployConfig = { remoteServer: "deploy@example.test", remotePath: "/var/www/site" }

const defaultEnvFile = [
  "# deploy target",
  "REMOTE_SERVER=deploy@example.test",
  "REMOTE_PATH=\"/var/www/site\"",
  ""
].join("\n")

const probed: ReadonlyArray<ToolCall> = [
  { _tag: "Probe", host: "deploy@example.test" },
  { _tag: "DirectoryTest", host: "deploy@example.test", path: "/var/www/site" }
]

interface ScenarioInput extends HarnessOptions {
  readonly envFile?: string
  readonly withoutEnvFile?: boolean
  readonly content?: Readonly<Record<string, string>>
  readonly fileSystem?: Layer.Layer<FileSystemService, never, FileSystem.FileSystem | Path.Path>
}

const runScenario = <A, E>(run: Effect.Effect<A, E, DeployEnv>, input: ScenarioInput) =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const path = yield* _(Path.Path)
      const cwd = yield* _(withTempProject(new URL(import.meta.url), "deploy-program-tests"))
      if (input.withoutEnvFile !== true) {
        yield* _(writeFile(path.join(cwd, ".env"), input.envFile ?? defaultEnvFile))
      }
      for (const [relative, text] of Object.entries(input.content ?? {})) {
        yield* _(writeFile(path.join(cwd, "content", relative), text))
      }

      const harness = yield* _(makeHarness(cwd, input))
      const result = yield* _(
        pipe(
          run,
          Effect.either,
          Effect.provide(Layer.mergeAll(harness.layer, input.fileSystem ?? FileSystemLive))
        )
      )

      return {
        cwd,
        result,
        calls: yield* _(harness.calls),
        questions: yield* _(harness.questions),
        exitCode: Option.getOrUndefined(yield* _(harness.exitCode))
      }
    })
  ).pipe(Effect.provide(NodeContext.layer))

const messageOf = <A>(result: Either.Either<A, DeployError>): string =>
  Either.match(result, { onLeft: describeDeployError, onRight: () => "ok" })

// Backups may not be created: makeDirectory rejects every path.
const ReadOnlyFileSystem = Layer.effect(
  FileSystemService,
  Effect.map(FileSystemService, (live) => ({
    ...live,
    makeDirectory: (pathValue: string) => Effect.fail(fileSystemError(pathValue, "read-only file system"))
  }))
).pipe(Layer.provide(FileSystemLive))

describe("pull content", () => {
  it.effect("backs up local content, previews, then transfers after confirmation", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(
        runScenario(program, { answers: ["1", "y"], content: { "home/home.txt": "Title: Home" } })
      )

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls).toEqual([
        ...probed,
        { _tag: "DryRun", plan: pullContentPlan(config) },
        { _tag: "Transfer", plan: pullContentPlan(config) }
      ])
      expect(scenario.questions).toEqual(["Choose (1-5): ", "Proceed with these changes? (y/N): "])

      const backedUp = yield* _(
        withFsPath((fs, path) =>
          Effect.gen(function*(_) {
            const backups = yield* _(fs.readDirectory(path.join(scenario.cwd, "backups")))
            expect(backups).toHaveLength(1)
            const [snapshot] = backups
            expect(snapshot).toMatch(/^\d{8}_\d{6}_content$/)
            return yield* _(
              fs.readFileString(path.join(scenario.cwd, "backups", snapshot ?? "", "home", "home.txt"))
            )
          })
        ).pipe(Effect.provide(NodeContext.layer))
      )
      expect(backedUp).toBe("Title: Home")
    }))

  it.effect("skips the backup when there is no local content", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["1", "y"] }))

      expect(scenario.exitCode).toBe(0)
      const backupsExist = yield* _(
        withFsPath((fs, path) => fs.exists(path.join(scenario.cwd, "backups"))).pipe(
          Effect.provide(NodeContext.layer)
        )
      )
      expect(backupsExist).toBe(false)
    }))

  it.effect("keeps going when the backup cannot be written", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(
        runScenario(program, {
          answers: ["1", "y"],
          content: { "home/home.txt": "Title: Home" },
          fileSystem: ReadOnlyFileSystem
        })
      )

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls).toEqual([
        ...probed,
        { _tag: "DryRun", plan: pullContentPlan(config) },
        { _tag: "Transfer", plan: pullContentPlan(config) }
      ])
    }))
})

describe("push codebase", () => {
  it.effect("transfers exactly what was previewed", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["2", "y"] }))

      expect(scenario.exitCode).toBe(0)
      const [, , preview, transfer] = scenario.calls
      expect(preview).toEqual({ _tag: "DryRun", plan: pushCodebasePlan(config) })
      expect(transfer).toEqual({ _tag: "Transfer", plan: pushCodebasePlan(config) })

      const previewArgs = buildRsyncArgs(pushCodebasePlan(config), "preview")
      const transferArgs = buildRsyncArgs(pushCodebasePlan(config), "execute")
      expect(previewArgs.filter((arg) => arg !== "--dry-run" && arg !== "--itemize-changes")).toEqual(
        transferArgs.filter((arg) => arg !== "--progress")
      )
    }))

  it.effect("stops before transferring when the preview fails", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(runDeploy, { answers: ["2"], dryRunFails: true }))

      expect(messageOf(scenario.result)).toBe("Error: Dry run failed. Check your connection and paths.")
      expect(scenario.calls).toEqual([...probed, { _tag: "DryRun", plan: pushCodebasePlan(config) }])
      expect(scenario.questions).toEqual(["Choose (1-5): "])
    }))

  it.effect("cancels on anything but y and exits non-zero", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["2", "n"] }))

      expect(scenario.exitCode).toBe(1)
      expect(scenario.calls).toEqual([...probed, { _tag: "DryRun", plan: pushCodebasePlan(config) }])
    }))

  it.effect("reports a failed transfer", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(runDeploy, { answers: ["2", "y"], transferFails: true }))

      expect(messageOf(scenario.result)).toBe("Error: Rsync failed")
      expect(scenario.calls).toHaveLength(4)
    }))
})

describe("push content", () => {
  it.effect("pushes without --delete when the mirror prompt is declined", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["3", "n", "n", "y"] }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls).toEqual([
        ...probed,
        { _tag: "DryRun", plan: pushContentPlan(config, false) },
        { _tag: "Transfer", plan: pushContentPlan(config, false) }
      ])
      expect(scenario.questions).toEqual([
        "Choose (1-5): ",
        "Pull remote content first to check for conflicts? (y/N): ",
        "Use --delete flag? (y/N): ",
        "Proceed with these changes? (y/N): "
      ])
    }))

  it.effect("treats an empty mirror answer as no", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["3", "", "", "y"] }))

      expect(scenario.calls.at(-1)).toEqual({ _tag: "Transfer", plan: pushContentPlan(config, false) })
    }))

  it.effect("mirrors with --delete when confirmed", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["3", "n", "Y", "y"] }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls.slice(2)).toEqual([
        { _tag: "DryRun", plan: pushContentPlan(config, true) },
        { _tag: "Transfer", plan: pushContentPlan(config, true) }
      ])
    }))

  it.effect("runs the pull as a conflict check before pushing", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["3", "y", "y", "n", "y"] }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls.slice(2)).toEqual([
        { _tag: "DryRun", plan: pullContentPlan(config) },
        { _tag: "Transfer", plan: pullContentPlan(config) },
        { _tag: "DryRun", plan: pushContentPlan(config, false) },
        { _tag: "Transfer", plan: pushContentPlan(config, false) }
      ])
    }))

  it.effect("ends the run when the conflict check is cancelled", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(runDeploy, { answers: ["3", "y", "n"] }))

      expect(messageOf(scenario.result)).toBe("Operation cancelled")
      expect(scenario.calls.slice(2)).toEqual([{ _tag: "DryRun", plan: pullContentPlan(config) }])
    }))
})

describe("preview all", () => {
  it.effect("dry-runs codebase and content without prompting", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["4"] }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls).toEqual([
        ...probed,
        { _tag: "DryRun", plan: pushCodebasePlan(config) },
        { _tag: "DryRun", plan: pushContentPlan(config, false) }
      ])
      expect(scenario.questions).toEqual(["Choose (1-5): "])
    }))

  it.effect("reports preview failures without failing", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["4"], dryRunFails: true }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls.filter((call) => call._tag === "DryRun")).toHaveLength(2)
    }))
})

describe("menu", () => {
  it.effect("exits cleanly on 5", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["5"] }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls).toEqual(probed)
    }))

  it.effect("rejects an unknown choice without transferring", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["9"] }))

      expect(scenario.exitCode).toBe(1)
      expect(scenario.calls).toEqual(probed)
    }))
})

describe("preconditions", () => {
  for (const answer of ["n", ""]) {
    it.effect(`exits when a missing remote path is answered with ${JSON.stringify(answer)}`, () =>
      Effect.gen(function*(_) {
        const scenario = yield* _(runScenario(program, { answers: [answer], remotePathExists: false }))

        expect(scenario.exitCode).toBe(1)
        expect(scenario.calls).toEqual(probed)
        expect(scenario.questions).toEqual(["Continue anyway? (y/N): "])
      }))
  }

  it.effect("continues past a missing remote path once confirmed", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: ["y", "5"], remotePathExists: false }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.questions).toEqual(["Continue anyway? (y/N): ", "Choose (1-5): "])
    }))

  it.effect("aborts when the host is unreachable", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(runDeploy, { answers: [], reachable: false }))

      expect(messageOf(scenario.result)).toBe(
        "Error: Cannot connect to deploy@example.test. Check SSH keys and server."
      )
      expect(scenario.calls).toEqual([{ _tag: "Probe", host: "deploy@example.test" }])
    }))

  it.effect("fails before any remote contact without a .env file", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(runScenario(program, { answers: [], withoutEnvFile: true }))

      expect(scenario.exitCode).toBe(1)
      expect(scenario.calls).toEqual([])
    }))

  it.effect("names the empty key", () =>
    Effect.gen(function*(_) {
      const scenario = yield* _(
        runScenario(runDeploy, {
          answers: [],
          envFile: "REMOTE_SERVER=deploy@example.test\nREMOTE_PATH=\n"
        })
      )

      expect(messageOf(scenario.result)).toBe("Error: REMOTE_PATH not set in .env")
      expect(scenario.calls).toEqual([])
    }))
})

describe("terminal input", () => {
  it.effect("exits non-zero without transferring when stdin is already closed", () =>
    Effect.gen(function*(_) {
      const prompt = linePromptLayer(endedInput(""), captureOutput().output)
      const scenario = yield* _(runScenario(program, { answers: [], prompt }))

      expect(scenario.exitCode).toBe(1)
      expect(scenario.calls).toEqual(probed)
    }))

  it.effect("declines the confirmation when input ends after the menu choice", () =>
    Effect.gen(function*(_) {
      const sink = captureOutput()
      const prompt = linePromptLayer(endedInput("2\n"), sink.output)
      const scenario = yield* _(runScenario(program, { answers: [], prompt }))

      expect(scenario.exitCode).toBe(1)
      expect(scenario.calls).toEqual([...probed, { _tag: "DryRun", plan: pushCodebasePlan(config) }])
      expect(sink.written()).toBe("Choose (1-5): Proceed with these changes? (y/N): ")
    }))

  it.effect("uses every answer piped in at once", () =>
    Effect.gen(function*(_) {
      const prompt = linePromptLayer(endedInput("2\ny\n"), captureOutput().output)
      const scenario = yield* _(runScenario(program, { answers: [], prompt }))

      expect(scenario.exitCode).toBe(0)
      expect(scenario.calls).toEqual([
        ...probed,
        { _tag: "DryRun", plan: pushCodebasePlan(config) },
        { _tag: "Transfer", plan: pushCodebasePlan(config) }
      ])
    }))
})

describe("interruption", () => {
  it.effect("leaves exit code 1 when the run is interrupted at a prompt", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        const path = yield* _(Path.Path)
        const cwd = yield* _(withTempProject(new URL(import.meta.url), "deploy-program-tests"))
        yield* _(writeFile(path.join(cwd, ".env"), defaultEnvFile))
        const harness = yield* _(makeHarness(cwd, { answers: [], stallWhenUnanswered: true }))

        const running = yield* _(
          pipe(program, Effect.provide(Layer.mergeAll(harness.layer, FileSystemLive)), Effect.fork)
        )
        expect(yield* _(harness.awaitingAnswer)).toBe("Choose (1-5): ")
        yield* _(Fiber.interrupt(running))

        expect(Option.getOrUndefined(yield* _(harness.exitCode))).toBe(1)
        expect(yield* _(harness.calls)).toEqual(probed)
      })
    ).pipe(Effect.provide(NodeContext.layer)))
})
