/**
 * Types for the selection step of `foundry init`
 */

export type SelectionOption = {
  /** Value recorded in the selections (e.g. "python.md") */
  value: string;
  /** Text shown next to the value */
  description?: string | null;
};

/**
 * One menu of the selection walk
 */
export type SelectionPrompt = {
  /** Stable step key (e.g. "base", "modular:lang", "hooks") */
  key: string;
  title: string;
  options: ReadonlyArray<SelectionOption>;
  /** Values pre-selected when the menu opens */
  defaults: ReadonlyArray<string>;
  /** At least one value must be selected before the menu can be confirmed */
  required: boolean;
};

export type SelectionResult =
  | { type: "accepted"; selected: Array<string> }
  | { type: "back" }
  | { type: "quit" };

/**
 * What to do with a CLAUDE.md that has no generated block
 */
export type HeaderChoice = "replace" | "merge" | "quit";

/**
 * Source of answers for the selection walk
 *
 * The interactive resolver asks the user; the non-interactive one accepts
 * every default.
 */
export type SelectionResolver = {
  interactive: boolean;
  resolve: (args: { prompt: SelectionPrompt }) => Promise<SelectionResult>;
  chooseHeaderAction: (args: {
    claudeMdPath: string;
    lines: number;
    chars: number;
  }) => Promise<HeaderChoice>;
  confirm: (args: { message: string; defaultValue: boolean }) => Promise<boolean>;
};
