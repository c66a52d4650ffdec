#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import type { Teardown } from "@effect/platform/Runtime"
import { Effect, Exit, Layer, pipe } from "effect"

import { FileSystemLive } from "../shell/services/file-system.js"
import { PromptLive } from "../shell/services/prompt.js"
import { RemoteShellLive } from "../shell/services/remote-shell.js"
import { RsyncLive } from "../shell/services/rsync.js"
import { RuntimeEnvLive } from "../shell/services/runtime-env.js"
import { INTERRUPTED_EXIT_CODE, program } from "./program.js"

const ServicesLive = Layer.mergeAll(
  RuntimeEnvLive,
  FileSystemLive,
  PromptLive,
  RemoteShellLive,
  Layer.provide(RsyncLive, RuntimeEnvLive)
)

const main = pipe(
  program,
  Effect.provide(Layer.provideMerge(ServicesLive, NodeContext.layer))
)

// program never fails, so a failed exit is an interruption (Ctrl+C, SIGTERM)
const teardown: Teardown = (exit, onExit) => {
  onExit(Exit.isFailure(exit) ? INTERRUPTED_EXIT_CODE : typeof process.exitCode === "number" ? process.exitCode : 0)
}

NodeRuntime.runMain(main, { teardown })
