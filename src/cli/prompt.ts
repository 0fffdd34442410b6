/**
 * Terminal input
 */

import { input } from "@inquirer/prompts";

/**
 * Ask the user for a line of text
 * @param args - Prompt arguments
 * @param args.prompt - Text shown before the cursor
 *
 * @returns The trimmed answer
 */
export const promptUser = async (args: { prompt: string }): Promise<string> => {
  const answer = await input({ message: args.prompt });
  return answer.trim();
};

/**
 * Ask a yes/no question
 * @param args - Prompt arguments
 * @param args.message - Question
 * @param args.defaultValue - Answer taken on empty input
 *
 * @returns True for "y" or "yes" (any case), the default on empty input, false otherwise
 */
export const promptConfirm = async (args: {
  message: string;
  defaultValue: boolean;
}): Promise<boolean> => {
  const { message, defaultValue } = args;
  const suffix = defaultValue ? "[Y/n]" : "[y/N]";
  const answer = (await promptUser({ prompt: `${message} ${suffix}` }))
    .toLowerCase();
  if (answer === "") {
    return defaultValue;
  }
  return answer === "y" || answer === "yes";
};
