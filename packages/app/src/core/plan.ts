import type { DeployConfig } from "./config.js"
import { buildFilterRules, toRsyncFilterArgs, type TransferKind } from "./filters.js"

export interface TransferPlan {
  readonly source: string
  readonly destination: string
  readonly deleteExtraneous: boolean
  readonly kind: TransferKind
}

export type TransferMode = "preview" | "execute"

// Relative to the working directory rsync is spawned in.
export const LOCAL_CONTENT = "content/"
export const LOCAL_CODEBASE = "./"

export const ARCHIVE_FLAGS = "-avz"
export const DELETE_FLAG = "--delete"
export const PREVIEW_FLAGS: ReadonlyArray<string> = ["--dry-run", "--itemize-changes"]
export const EXECUTE_FLAGS: ReadonlyArray<string> = ["--progress"]

export const remoteLocation = (config: DeployConfig, subPath: string): string =>
  `${config.remoteServer}:${config.remotePath}/${subPath}`

// PURITY: CORE
// INVARIANT: pulls never set the delete flag
export const pullContentPlan = (config: DeployConfig): TransferPlan => ({
  source: remoteLocation(config, LOCAL_CONTENT),
  destination: LOCAL_CONTENT,
  deleteExtraneous: false,
  kind: "content"
})

export const pushCodebasePlan = (config: DeployConfig): TransferPlan => ({
  source: LOCAL_CODEBASE,
  destination: remoteLocation(config, ""),
  deleteExtraneous: false,
  kind: "codebase"
})

// PURITY: CORE
// INVARIANT: deleteExtraneous is exactly the operator's mirror answer
export const pushContentPlan = (config: DeployConfig, deleteExtraneous: boolean): TransferPlan => ({
  source: LOCAL_CONTENT,
  destination: remoteLocation(config, LOCAL_CONTENT),
  deleteExtraneous,
  kind: "content"
})

/**
 * Renders the rsync argument vector for a plan.
 *
 * @param plan - Resolved source, destination, delete flag and rule kind.
 * @param mode - "preview" adds the dry-run flags, "execute" adds progress reporting.
 *
 * @pure true
 * @invariant args(plan, "preview") and args(plan, "execute") differ only in the mode flags
 * @complexity O(r) where r = number of filter rules
 */
export const buildRsyncArgs = (plan: TransferPlan, mode: TransferMode): ReadonlyArray<string> => [
  ARCHIVE_FLAGS,
  ...(plan.deleteExtraneous ? [DELETE_FLAG] : []),
  ...(mode === "preview" ? PREVIEW_FLAGS : EXECUTE_FLAGS),
  ...toRsyncFilterArgs(buildFilterRules(plan.kind)),
  plan.source,
  plan.destination
]
