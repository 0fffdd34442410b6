/**
 * Console logger for the foundry CLI
 *
 * All output goes through these helpers so `--silent` can suppress it in one
 * place. Colours come from chalk, which disables itself when stdout is not a
 * TTY.
 */

import chalk from "chalk";

let silentMode = false;

/**
 * Enable or disable silent mode
 * @param args - Configuration arguments
 * @param args.silent - Whether to suppress all output
 */
export const setSilentMode = (args: { silent: boolean }): void => {
  const { silent } = args;
  silentMode = silent;
};

/**
 * Check whether silent mode is active
 *
 * @returns True when output is suppressed
 */
export const isSilentMode = (): boolean => {
  return silentMode;
};

/**
 * Print an error message to stderr
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const error = (args: { message: string }): void => {
  const { message } = args;
  if (silentMode) {
    return;
  }
  console.error(chalk.red(message));
};

/**
 * Print a warning message
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const warn = (args: { message: string }): void => {
  const { message } = args;
  if (silentMode) {
    return;
  }
  console.log(chalk.yellow(message));
};

/**
 * Print an informational message
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const info = (args: { message: string }): void => {
  const { message } = args;
  if (silentMode) {
    return;
  }
  console.log(chalk.cyan(message));
};

/**
 * Print a success message
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const success = (args: { message: string }): void => {
  const { message } = args;
  if (silentMode) {
    return;
  }
  console.log(chalk.green(message));
};

/**
 * Print a debug message, only when FOUNDRY_DEBUG is set
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const debug = (args: { message: string }): void => {
  const { message } = args;
  if (silentMode || process.env.FOUNDRY_DEBUG == null) {
    return;
  }
  console.log(chalk.gray(`[debug] ${message}`));
};

/**
 * Print a message without any colouring
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const raw = (args: { message: string }): void => {
  const { message } = args;
  if (silentMode) {
    return;
  }
  console.log(message);
};

/**
 * Print an empty line
 */
export const newline = (): void => {
  if (silentMode) {
    return;
  }
  console.log();
};

export const brightCyan = (args: { text: string }): string => {
  return chalk.cyanBright(args.text);
};

export const boldWhite = (args: { text: string }): string => {
  return chalk.bold.white(args.text);
};

export const gray = (args: { text: string }): string => {
  return chalk.gray(args.text);
};
