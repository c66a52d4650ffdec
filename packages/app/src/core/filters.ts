import { Match } from "effect"

export type TransferKind = "content" | "codebase"

export interface FilterRule {
  readonly action: "include" | "exclude"
  readonly pattern: string
}

const include = (...patterns: ReadonlyArray<string>): ReadonlyArray<FilterRule> =>
  patterns.map((pattern): FilterRule => ({ action: "include", pattern }))

const exclude = (...patterns: ReadonlyArray<string>): ReadonlyArray<FilterRule> =>
  patterns.map((pattern): FilterRule => ({ action: "exclude", pattern }))

export const UNIVERSAL_EXCLUDE: FilterRule = { action: "exclude", pattern: "*" }

const contentRules: ReadonlyArray<FilterRule> = exclude(".DS_Store", "Icon*", "Thumbs.db", "._*")

// Whitelist: cache/session excludes must precede the site/*** include.
const codebaseRules: ReadonlyArray<FilterRule> = [
  ...include("index.php", "kirby/***", ".htaccess"),
  ...exclude("site/cache", "site/sessions"),
  ...include("site/***", "assets/***", "vendor/***"),
  UNIVERSAL_EXCLUDE
]

// FORMAT THEOREM: forall k: buildFilterRules(k) is one fixed ordered list per k
// PURITY: CORE
// INVARIANT: buildFilterRules("codebase") ends with UNIVERSAL_EXCLUDE
// COMPLEXITY: O(1)/O(1)
export const buildFilterRules = (kind: TransferKind): ReadonlyArray<FilterRule> =>
  Match.value(kind).pipe(
    Match.when("content", () => contentRules),
    Match.when("codebase", () => codebaseRules),
    Match.exhaustive
  )

// FORMAT THEOREM: forall r in rules: arg(r) = "--" + r.action + "=" + r.pattern
// PURITY: CORE
// INVARIANT: argument order equals rule order
// COMPLEXITY: O(r)/O(r)
export const toRsyncFilterArgs = (rules: ReadonlyArray<FilterRule>): ReadonlyArray<string> =>
  rules.map((rule) => `--${rule.action}=${rule.pattern}`)
