import { Either, Option, pipe } from "effect"

export interface EnvEntry {
  readonly key: string
  readonly value: string
}

export interface DeployConfig {
  readonly remoteServer: string
  readonly remotePath: string
}

export const ENV_FILE_NAME = ".env"
export const REMOTE_SERVER_KEY = "REMOTE_SERVER"
export const REMOTE_PATH_KEY = "REMOTE_PATH"

const stripQuotes = (value: string): string =>
  value.length >= 2 && value.startsWith("\"") && value.endsWith("\"")
    ? value.slice(1, -1)
    : value

const parseLine = (line: string): Option.Option<EnvEntry> => {
  const normalized = line.endsWith("\r") ? line.slice(0, -1) : line
  const separator = normalized.indexOf("=")
  const key = (separator === -1 ? normalized : normalized.slice(0, separator)).trim()
  if (key.length === 0 || key.startsWith("#")) {
    return Option.none()
  }
  const rawValue = separator === -1 ? "" : normalized.slice(separator + 1)
  return Option.some({ key, value: stripQuotes(rawValue) })
}

/**
 * Parses `KEY=VALUE` lines of an env file.
 *
 * @param content - Raw file text.
 * @returns Entries in file order; blank and `#` lines are dropped.
 *
 * @pure true
 * @invariant value keeps everything after the first "=", minus one pair of surrounding double quotes
 * @complexity O(n) where n = |content|
 */
export const parseEnvFile = (content: string): ReadonlyArray<EnvEntry> =>
  content.split("\n").flatMap((line) =>
    Option.match(parseLine(line), {
      onNone: () => [],
      onSome: (entry) => [entry]
    })
  )

// later assignments override earlier ones, as repeated exports would
const toLookup = (entries: ReadonlyArray<EnvEntry>): ReadonlyMap<string, string> =>
  new Map(entries.map((entry) => [entry.key, entry.value]))

const requireValue = (
  values: ReadonlyMap<string, string>,
  key: string
): Either.Either<string, string> =>
  pipe(
    Option.fromNullable(values.get(key)),
    Option.filter((value) => value.length > 0),
    Either.fromOption(() => key)
  )

// FORMAT THEOREM: forall es: resolve(es) = Right(c) -> c.remoteServer != "" && c.remotePath != ""
// PURITY: CORE
// INVARIANT: Left carries the first missing key, REMOTE_SERVER before REMOTE_PATH
// INVARIANT: the last assignment of a key wins
// COMPLEXITY: O(n)/O(n)
export const resolveDeployConfig = (
  entries: ReadonlyArray<EnvEntry>
): Either.Either<DeployConfig, string> => {
  const values = toLookup(entries)
  return Either.all({
    remoteServer: requireValue(values, REMOTE_SERVER_KEY),
    remotePath: requireValue(values, REMOTE_PATH_KEY)
  })
}
