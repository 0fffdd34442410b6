/**
 * Run configuration for foundry commands
 *
 * Each value comes from the command line first, then the environment, then
 * the package defaults.
 */

import * as path from "path";

import { ValidationError } from "@/cli/errors.js";
import { getPackageRoot } from "@/cli/version.js";
import { normalizeProjectDir } from "@/utils/path.js";

export const CONTENT_ROOT_ENV = "FOUNDRY_CONTENT_ROOT";

/**
 * Resolved configuration of one command run
 */
export type Config = {
  /** Absolute project root */
  projectDir: string;
  /** Absolute content root holding registry.json */
  contentRoot: string;
  /** Whether prompts may be shown */
  interactive: boolean;
  /** Merge the generated block into a CLAUDE.md without one on non-interactive runs */
  force: boolean;
};

/**
 * Locate the content bundled with the package
 *
 * @returns `<packageRoot>/content`, or null when the package root is unknown
 */
export const getBundledContentRoot = (): string | null => {
  const packageRoot = getPackageRoot();
  return packageRoot == null ? null : path.join(packageRoot, "content");
};

/**
 * Pick the content root
 * @param args - Resolution arguments
 * @param args.contentRoot - Value of --content-root
 * @param args.env - Environment to read FOUNDRY_CONTENT_ROOT from
 *
 * @throws ValidationError when no content root can be found
 *
 * @returns Absolute content root
 */
export const resolveContentRoot = (args: {
  contentRoot?: string | null;
  env?: NodeJS.ProcessEnv | null;
}): string => {
  const env = args.env ?? process.env;
  const fromEnv = env[CONTENT_ROOT_ENV];

  if (args.contentRoot != null && args.contentRoot !== "") {
    return path.resolve(args.contentRoot);
  }
  if (fromEnv != null && fromEnv !== "") {
    return path.resolve(fromEnv);
  }

  const bundled = getBundledContentRoot();
  if (bundled == null) {
    throw new ValidationError(
      `Unable to locate the bundled content. Pass --content-root or set ${CONTENT_ROOT_ENV}.`,
    );
  }
  return bundled;
};

/**
 * Build the configuration of a command run
 * @param args - Command line values
 * @param args.projectDir - Project directory argument (defaults to the current directory)
 * @param args.contentRoot - Value of --content-root
 * @param args.nonInteractive - Value of --non-interactive
 * @param args.force - Value of --force
 * @param args.env - Environment (defaults to process.env)
 *
 * @returns Resolved configuration
 */
export const resolveConfig = (args: {
  projectDir?: string | null;
  contentRoot?: string | null;
  nonInteractive?: boolean | null;
  force?: boolean | null;
  env?: NodeJS.ProcessEnv | null;
}): Config => {
  return {
    projectDir: normalizeProjectDir({ projectDir: args.projectDir }),
    contentRoot: resolveContentRoot(args),
    interactive: !(args.nonInteractive ?? false),
    force: args.force ?? false,
  };
};
