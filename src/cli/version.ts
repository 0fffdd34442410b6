/**
 * Package version helpers
 */

import { readFileSync } from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

import semver from "semver";

const PACKAGE_NAME = "foundry-setup";

const readPackageJson = (dir: string): unknown => {
  try {
    return JSON.parse(readFileSync(path.join(dir, "package.json"), "utf-8"));
  } catch {
    return null;
  }
};

/**
 * Find this package's package.json by walking up from the current module
 *
 * @returns Absolute path to the package root, or null if not found
 */
export const getPackageRoot = (): string | null => {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  let previous = "";

  while (dir !== previous) {
    const pkg = readPackageJson(dir);
    if (
      pkg != null &&
      typeof pkg === "object" &&
      "name" in pkg &&
      pkg.name === PACKAGE_NAME
    ) {
      return dir;
    }
    previous = dir;
    dir = path.dirname(dir);
  }

  return null;
};

/**
 * Read the version of the running foundry package
 *
 * @returns The version string, or null if it cannot be determined
 */
export const getCurrentPackageVersion = (): string | null => {
  const root = getPackageRoot();
  if (root == null) {
    return null;
  }

  const pkg = readPackageJson(root);
  if (
    pkg != null &&
    typeof pkg === "object" &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return null;
};

/**
 * Relationship between a project's configured version and this package
 */
export type VersionChange = "same" | "upgrade" | "downgrade" | "unknown";

/**
 * Compare the version a project was configured with against the current one
 * @param args - Comparison arguments
 * @param args.configured - Version recorded in the project (.claude/VERSION)
 * @param args.current - Version of the running package
 *
 * @returns How the configured version relates to the current one
 */
export const compareConfiguredVersion = (args: {
  configured: string;
  current: string;
}): VersionChange => {
  const configured = semver.valid(semver.coerce(args.configured));
  const current = semver.valid(semver.coerce(args.current));

  if (configured == null || current == null) {
    return args.configured === args.current ? "same" : "unknown";
  }

  if (semver.eq(configured, current)) {
    return "same";
  }
  return semver.lt(configured, current) ? "upgrade" : "downgrade";
};
