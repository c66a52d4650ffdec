import { Option } from "effect"

export type MenuChoice =
  | "pull-content"
  | "push-codebase"
  | "push-content"
  | "preview-all"
  | "exit"

interface MenuEntry {
  readonly key: string
  readonly choice: MenuChoice
  readonly label: string
}

const menuEntries: ReadonlyArray<MenuEntry> = [
  { key: "1", choice: "pull-content", label: "Pull content from remote" },
  { key: "2", choice: "push-codebase", label: "Push codebase to remote" },
  { key: "3", choice: "push-content", label: "Push content to remote" },
  { key: "4", choice: "preview-all", label: "Show what's different (dry-run everything)" },
  { key: "5", choice: "exit", label: "Exit" }
]

export const MENU_TITLE = "Kirby Deploy Tool"
export const MENU_PROMPT = `Choose (1-${menuEntries.length}): `

// PURITY: CORE
// INVARIANT: blank line, title, one line per entry in key order, blank line
export const renderMenu = (): ReadonlyArray<string> => [
  "",
  MENU_TITLE,
  ...menuEntries.map((entry) => `${entry.key}. ${entry.label}`),
  ""
]

/**
 * Maps raw menu input to a choice.
 *
 * @pure true
 * @invariant Option.none() for anything but the listed keys (surrounding whitespace ignored)
 */
export const parseMenuChoice = (input: string): Option.Option<MenuChoice> => {
  const key = input.trim()
  return Option.map(
    Option.fromNullable(menuEntries.find((entry) => entry.key === key)),
    (entry) => entry.choice
  )
}

// FORMAT THEOREM: forall a: isAffirmative(a) <-> trim(a) starts with "y" | "Y"
// PURITY: CORE
// INVARIANT: empty input takes the "N" default
// COMPLEXITY: O(|a|)/O(1)
export const isAffirmative = (answer: string): boolean => /^[Yy]/.test(answer.trim())
