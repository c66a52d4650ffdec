import { Console, Effect, pipe } from "effect"

import type { DeployConfig } from "../../core/config.js"
import {
  type ConnectivityFailure,
  connectivityFailure,
  type PromptFailure,
  type RemotePathRejected,
  remotePathRejected
} from "../../core/errors.js"
import { Prompt } from "../services/prompt.js"
import { RemoteShell } from "../services/remote-shell.js"

// FORMAT THEOREM: forall c: verifyRemote(c) succeeds -> reachable(c.remoteServer)
// PURITY: SHELL
// EFFECT: Effect<void, ConnectivityFailure | RemotePathRejected | PromptFailure, RemoteShell | Prompt>
// INVARIANT: an unreachable host fails without prompting
// INVARIANT: a missing path continues only after an explicit "y"
// COMPLEXITY: O(1)/O(1)
export const verifyRemote = (
  config: DeployConfig
): Effect.Effect<void, ConnectivityFailure | RemotePathRejected | PromptFailure, RemoteShell | Prompt> =>
  Effect.gen(function*(_) {
    const remote = yield* _(RemoteShell)
    const prompt = yield* _(Prompt)
    const host = config.remoteServer

    yield* _(Console.log(`Testing connection to ${host}...`))
    yield* _(pipe(remote.probe(host), Effect.mapError((error) => connectivityFailure(host, error.reason))))

    const present = yield* _(
      pipe(
        remote.directoryExists(host, config.remotePath),
        Effect.mapError((error) => connectivityFailure(host, error.reason))
      )
    )
    if (!present) {
      yield* _(Console.log(`Warning: Remote path '${config.remotePath}' does not exist.`))
      const proceed = yield* _(prompt.confirm("Continue anyway? (y/N): "))
      if (!proceed) {
        return yield* _(Effect.fail(remotePathRejected(config.remotePath)))
      }
    }

    yield* _(Console.log("Connection successful"))
  })
