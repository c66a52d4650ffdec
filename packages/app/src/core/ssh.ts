export const SSH_CONNECT_TIMEOUT_SECONDS = 5

const BATCH_MODE: ReadonlyArray<string> = ["-o", "BatchMode=yes"]

// Wrap in single quotes; embedded single quotes become '\''
export const escapeShellArg = (arg: string): string => `'${arg.replaceAll("'", "'\\''")}'`

/**
 * Arguments for a no-op authenticated login that never asks for a password.
 *
 * @pure true
 */
export const buildProbeArgs = (host: string): ReadonlyArray<string> => [
  ...BATCH_MODE,
  "-o",
  `ConnectTimeout=${SSH_CONNECT_TIMEOUT_SECONDS}`,
  host,
  "exit"
]

// FORMAT THEOREM: forall h, p: remote shell sees test -d with p as a single word
// PURITY: CORE
// INVARIANT: BatchMode is always set, so ssh never prompts
// COMPLEXITY: O(|p|)/O(|p|)
export const buildDirectoryTestArgs = (host: string, remotePath: string): ReadonlyArray<string> => [
  ...BATCH_MODE,
  host,
  `test -d ${escapeShellArg(remotePath)}`
]
