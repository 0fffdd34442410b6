/**
 * Interactive and non-interactive selection resolvers
 */

import {
  boldWhite,
  brightCyan,
  gray,
  info,
  newline,
  raw,
  warn,
} from "@/cli/logger.js";
import { promptConfirm, promptUser } from "@/cli/prompt.js";

import type {
  HeaderChoice,
  SelectionPrompt,
  SelectionResolver,
  SelectionResult,
} from "./types.js";

/**
 * Parsed line of toggle-menu input
 */
export type ToggleCommand =
  | { type: "confirm" }
  | { type: "back" }
  | { type: "quit" }
  | {
      type: "toggle";
      /** Zero-based option indices, in input order */
      indices: Array<number>;
      /** Tokens that are not option numbers */
      ignored: Array<string>;
    };

/**
 * Parse one line typed at a toggle menu
 *
 * Empty input confirms. `b`/`back` and `q`/`quit` navigate (any case).
 * Anything else is whitespace-separated option numbers starting at 1.
 *
 * @param line - Raw input
 * @param optionCount - Number of options in the menu
 *
 * @returns Toggle command
 */
export const parseToggleInput = (
  line: string,
  optionCount: number,
): ToggleCommand => {
  const trimmed = line.trim();
  if (trimmed === "") {
    return { type: "confirm" };
  }

  const lowered = trimmed.toLowerCase();
  if (lowered === "b" || lowered === "back") {
    return { type: "back" };
  }
  if (lowered === "q" || lowered === "quit") {
    return { type: "quit" };
  }

  const indices: Array<number> = [];
  const ignored: Array<string> = [];
  for (const token of trimmed.split(/\s+/)) {
    const number = /^\d+$/.test(token) ? Number(token) : NaN;
    if (number >= 1 && number <= optionCount) {
      indices.push(number - 1);
    } else {
      ignored.push(token);
    }
  }
  return { type: "toggle", indices, ignored };
};

const renderMenu = (args: {
  prompt: SelectionPrompt;
  selected: ReadonlySet<string>;
}): void => {
  const { prompt, selected } = args;
  newline();
  raw({ message: boldWhite({ text: `=== ${prompt.title} ===` }) });
  prompt.options.forEach((option, index) => {
    const mark = selected.has(option.value) ? "X" : " ";
    const number = brightCyan({ text: `${index + 1}.` });
    const description =
      option.description == null
        ? ""
        : ` ${gray({ text: `— ${option.description}` })}`;
    raw({ message: `  [${mark}] ${number} ${option.value}${description}` });
  });
};

/**
 * Run one toggle menu until the user confirms, goes back or quits
 * @param args - Menu arguments
 * @param args.prompt - Menu to show
 *
 * @returns Selection result; accepted values follow option order
 */
export const runToggleMenu = async (args: {
  prompt: SelectionPrompt;
}): Promise<SelectionResult> => {
  const { prompt } = args;
  // Work on a copy; the prompt's defaults are never touched.
  const selected = new Set(prompt.defaults);

  while (true) {
    renderMenu({ prompt, selected });
    const line = await promptUser({
      prompt:
        "Toggle (space-separated numbers, Enter to confirm, b = back, q = quit):",
    });
    const command = parseToggleInput(line, prompt.options.length);

    switch (command.type) {
      case "back":
      case "quit":
        return command;
      case "confirm":
        if (prompt.required && selected.size === 0) {
          warn({ message: "At least one selection required." });
          continue;
        }
        return {
          type: "accepted",
          selected: prompt.options
            .map((option) => option.value)
            .filter((value) => selected.has(value)),
        };
      case "toggle":
        for (const index of command.indices) {
          const value = prompt.options[index].value;
          if (selected.has(value)) {
            selected.delete(value);
          } else {
            selected.add(value);
          }
        }
        if (command.ignored.length > 0) {
          warn({ message: `Ignored: ${command.ignored.join(" ")}` });
        }
    }
  }
};

const chooseHeaderActionInteractively = async (args: {
  claudeMdPath: string;
  lines: number;
  chars: number;
}): Promise<HeaderChoice> => {
  const { claudeMdPath, lines, chars } = args;
  newline();
  info({
    message: `${claudeMdPath} exists (${lines} lines, ${chars} chars) without a foundry block.`,
  });
  raw({ message: "  [R] Replace - generate a new CLAUDE.md (original saved to CLAUDE.md.old)" });
  raw({ message: "  [M] Merge - prepend the foundry block (original saved to CLAUDE.md.old)" });
  raw({ message: "  [Q] Quit - abort setup" });
  newline();
  raw({
    message: gray({
      text: "Keep CLAUDE.md short; detailed documentation belongs in docs/.",
    }),
  });

  const answer = (await promptUser({ prompt: "Choice [R/M/Q]:" })).toUpperCase();
  if (answer === "Q") {
    return "quit";
  }
  return answer === "R" ? "replace" : "merge";
};

/**
 * Resolver that asks the user at the terminal
 *
 * @returns Interactive resolver
 */
export const createInteractiveResolver = (): SelectionResolver => {
  return {
    interactive: true,
    resolve: runToggleMenu,
    chooseHeaderAction: chooseHeaderActionInteractively,
    confirm: promptConfirm,
  };
};

/**
 * Resolver that accepts every default without asking
 *
 * @returns Non-interactive resolver
 */
export const createNonInteractiveResolver = (): SelectionResolver => {
  return {
    interactive: false,
    resolve: async ({ prompt }) => ({
      type: "accepted",
      selected: [...prompt.defaults],
    }),
    chooseHeaderAction: async () => "quit",
    confirm: async ({ defaultValue }) => defaultValue,
  };
};
