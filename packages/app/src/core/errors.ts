import { Option } from "effect"
import { match } from "ts-pattern"

export interface ConfigurationMissing {
  readonly _tag: "ConfigurationMissing"
  readonly file: string
  readonly key: Option.Option<string>
}

export interface ConnectivityFailure {
  readonly _tag: "ConnectivityFailure"
  readonly host: string
  readonly reason: string
}

export interface RemotePathRejected {
  readonly _tag: "RemotePathRejected"
  readonly path: string
}

export interface DryRunFailure {
  readonly _tag: "DryRunFailure"
  readonly reason: string
}

export interface TransferFailure {
  readonly _tag: "TransferFailure"
  readonly reason: string
}

export interface OperationCancelled {
  readonly _tag: "OperationCancelled"
}

export interface InvalidMenuChoice {
  readonly _tag: "InvalidMenuChoice"
  readonly input: string
}

export interface PromptFailure {
  readonly _tag: "PromptFailure"
  readonly reason: string
}

export type DeployError =
  | ConfigurationMissing
  | ConnectivityFailure
  | RemotePathRejected
  | DryRunFailure
  | TransferFailure
  | OperationCancelled
  | InvalidMenuChoice
  | PromptFailure

// Soft failures: mapped to a DeployError or downgraded to a warning where they occur.

export interface BackupFailure {
  readonly _tag: "BackupFailure"
  readonly path: string
  readonly reason: string
}

export interface FileSystemError {
  readonly _tag: "FileSystemError"
  readonly path: string
  readonly reason: string
}

export interface ToolFailure {
  readonly _tag: "ToolFailure"
  readonly tool: "ssh" | "rsync"
  readonly reason: string
}

export const configurationMissing = (
  file: string,
  key: Option.Option<string>
): ConfigurationMissing => ({ _tag: "ConfigurationMissing", file, key })

export const connectivityFailure = (host: string, reason: string): ConnectivityFailure => ({
  _tag: "ConnectivityFailure",
  host,
  reason
})

export const remotePathRejected = (path: string): RemotePathRejected => ({
  _tag: "RemotePathRejected",
  path
})

export const dryRunFailure = (reason: string): DryRunFailure => ({ _tag: "DryRunFailure", reason })

export const transferFailure = (reason: string): TransferFailure => ({ _tag: "TransferFailure", reason })

export const operationCancelled: OperationCancelled = { _tag: "OperationCancelled" }

export const invalidMenuChoice = (input: string): InvalidMenuChoice => ({
  _tag: "InvalidMenuChoice",
  input
})

export const promptFailure = (reason: string): PromptFailure => ({ _tag: "PromptFailure", reason })

export const backupFailure = (path: string, reason: string): BackupFailure => ({
  _tag: "BackupFailure",
  path,
  reason
})

export const fileSystemError = (path: string, reason: string): FileSystemError => ({
  _tag: "FileSystemError",
  path,
  reason
})

export const toolFailure = (tool: ToolFailure["tool"], reason: string): ToolFailure => ({
  _tag: "ToolFailure",
  tool,
  reason
})

/**
 * Renders the operator-facing line for a deploy failure.
 *
 * @pure true
 * @invariant every DeployError tag has exactly one message
 */
export const describeDeployError = (error: DeployError): string =>
  match(error)
    .with({ _tag: "ConfigurationMissing" }, ({ file, key }) =>
      Option.match(key, {
        onNone: () => `Error: ${file} file not found. Create one with REMOTE_SERVER and REMOTE_PATH.`,
        onSome: (missing) => `Error: ${missing} not set in ${file}`
      }))
    .with({ _tag: "ConnectivityFailure" }, ({ host }) =>
      `Error: Cannot connect to ${host}. Check SSH keys and server.`)
    .with({ _tag: "RemotePathRejected" }, () => "Exiting...")
    .with({ _tag: "DryRunFailure" }, () => "Error: Dry run failed. Check your connection and paths.")
    .with({ _tag: "TransferFailure" }, () => "Error: Rsync failed")
    .with({ _tag: "OperationCancelled" }, () => "Operation cancelled")
    .with({ _tag: "InvalidMenuChoice" }, () => "Invalid choice")
    .with({ _tag: "PromptFailure" }, ({ reason }) => `Error: Cannot read answer (${reason})`)
    .exhaustive()

// Intentional stops (declined prompts) are reported on stdout, failures on stderr.
// PURITY: CORE
// COMPLEXITY: O(1)/O(1)
export const isOperatorStop = (error: DeployError): boolean =>
  error._tag === "OperationCancelled" || error._tag === "RemotePathRejected"
