/**
 * Project directory helpers
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { BLOCK_START } from "@/cli/features/claude-md/header.js";
import { getClaudeMdFile, getManifestPath } from "@/cli/features/paths.js";

/**
 * Normalize a project directory path
 * @param args - Configuration arguments
 * @param args.projectDir - The project directory (optional)
 *
 * @returns Absolute path to the project root
 */
export const normalizeProjectDir = (args: {
  projectDir?: string | null;
}): string => {
  const { projectDir } = args;

  // Use current working directory if no projectDir provided or empty
  if (projectDir == null || projectDir === "") {
    return process.cwd();
  }

  let normalizedPath = projectDir;

  // Expand tilde to home directory
  if (normalizedPath.startsWith("~/")) {
    normalizedPath = path.join(os.homedir(), normalizedPath.slice(2));
  } else if (normalizedPath === "~") {
    normalizedPath = os.homedir();
  }

  normalizedPath = path.resolve(normalizedPath);

  // A path to the .claude directory means its project
  if (path.basename(normalizedPath) === ".claude") {
    return path.dirname(normalizedPath);
  }

  return normalizedPath;
};

/**
 * Check whether a directory holds a foundry configuration
 * @param dir - Directory to check
 *
 * @returns True when it has a setup manifest or a CLAUDE.md with the foundry block
 */
export const isConfiguredProject = (dir: string): boolean => {
  if (fs.existsSync(getManifestPath({ projectDir: dir }))) {
    return true;
  }

  const claudeMdPath = getClaudeMdFile({ projectDir: dir });
  if (!fs.existsSync(claudeMdPath)) {
    return false;
  }
  try {
    return fs.readFileSync(claudeMdPath, "utf-8").includes(BLOCK_START);
  } catch {
    return false;
  }
};

/**
 * Get all configured projects, starting from the current directory
 * Searches the current directory first, then its ancestors
 * @param args - Configuration arguments
 * @param args.currentDir - The directory to start searching from (defaults to process.cwd())
 *
 * @returns Paths of configured directories, closest first
 */
export const getConfiguredDirs = (args?: {
  currentDir?: string | null;
}): Array<string> => {
  const currentDir = args?.currentDir || process.cwd();
  const results: Array<string> = [];

  let checkDir = currentDir;
  let previousDir = "";
  while (checkDir !== previousDir) {
    if (isConfiguredProject(checkDir)) {
      results.push(checkDir);
    }
    previousDir = checkDir;
    checkDir = path.dirname(checkDir);
  }

  return results;
};
