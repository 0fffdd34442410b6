/**
 * Private content sources
 *
 * A private source is an external directory laid out like the content root.
 * Everything it deploys is named `<prefix>-<name>`, which lets several sources
 * and the registry share the same category directories without stepping on
 * each other.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { ValidationError, describeError } from "@/cli/errors.js";
import { PRIVATE_CATEGORIES } from "@/cli/features/manifest/types.js";
import {
  classifyEntry,
  createOwnershipPolicy,
  isOwnedBy,
} from "@/cli/features/ownership/ownership.js";
import { getCategoryDir } from "@/cli/features/paths.js";
import {
  createReport,
  deployItem,
  listVisibleEntries,
} from "@/cli/features/reconcile/reconcile.js";
import { debug } from "@/cli/logger.js";
import { pathExists } from "@/utils/fs.js";

import type {
  PrivateSelections,
  PrivateSourceRef,
} from "@/cli/features/manifest/types.js";
import type { DeployCategory } from "@/cli/features/paths.js";
import type {
  DeploymentReport,
  DesiredItem,
} from "@/cli/features/reconcile/types.js";
import type { Dirent } from "fs";

const PREFIX_PATTERN = /^[a-z][a-z0-9-]*$/;

/**
 * Result of deploying one private source
 */
export type PrivateDeployReport = {
  prefix: string;
  /** Identifiers that were copied, per category */
  deployed: PrivateSelections;
  /** One report per category with the copy and removal details */
  reports: Array<DeploymentReport>;
};

/**
 * Result of removing the entries a prefix owns
 */
export type PrivateCleanResult = {
  /** Paths of the removed entries */
  removed: Array<string>;
  /** One report per category where something was removed or failed to be */
  reports: Array<DeploymentReport>;
};

export const emptyPrivateSelections = (): PrivateSelections => {
  return { rules: [], commands: [], skills: [], agents: [], hooks: [] };
};

/**
 * Check a candidate prefix
 *
 * A prefix is also rejected when a reserved name starts with `<prefix>-`,
 * since every entry of that name would then count as the source's own.
 *
 * @param candidate - Prefix to validate
 * @param existingPrefixes - Prefixes already registered
 * @param reserved - Names no prefix may take
 *
 * @returns Error message, or null when the prefix is acceptable
 */
export const validatePrefix = (
  candidate: string,
  existingPrefixes: Iterable<string>,
  reserved: Iterable<string>,
): string | null => {
  if (!PREFIX_PATTERN.test(candidate)) {
    return `Invalid prefix "${candidate}": must start with a lowercase letter and contain only lowercase letters, digits, and hyphens`;
  }
  if (
    [...reserved].some(
      (name) => name === candidate || name.startsWith(`${candidate}-`),
    )
  ) {
    return `Prefix "${candidate}" conflicts with reserved name`;
  }
  if ([...existingPrefixes].includes(candidate)) {
    return `Prefix "${candidate}" is already registered`;
  }
  return null;
};

const readDirents = async (dir: string): Promise<Array<Dirent>> => {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => !entry.name.startsWith("."))
      .sort((a, b) => a.name.localeCompare(b.name));
  } catch {
    return [];
  }
};

const listMarkdownFiles = async (dir: string): Promise<Array<string>> => {
  return (await readDirents(dir))
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry) => entry.name);
};

/**
 * Find the deployable content of a private source directory
 *
 * Layout:
 * - `rule-library/<topic>/<rule>.md` (identifier `<topic>/<rule>.md`)
 * - `commands/*.md`, `agents/*.md`
 * - `skills/<name>/SKILL.md` (identifier `<name>`)
 * - `hooks/library/*`
 *
 * Anything else is ignored.
 *
 * @param sourceDir - Private source directory
 *
 * @returns Identifiers per category, empty lists when the directory is absent
 */
export const discoverPrivateContent = async (
  sourceDir: string,
): Promise<PrivateSelections> => {
  const content = emptyPrivateSelections();

  const ruleLibrary = path.join(sourceDir, "rule-library");
  for (const topic of await readDirents(ruleLibrary)) {
    if (!topic.isDirectory()) {
      continue;
    }
    for (const rule of await listMarkdownFiles(
      path.join(ruleLibrary, topic.name),
    )) {
      content.rules.push(`${topic.name}/${rule}`);
    }
  }

  content.commands = await listMarkdownFiles(path.join(sourceDir, "commands"));
  content.agents = await listMarkdownFiles(path.join(sourceDir, "agents"));

  const skillsDir = path.join(sourceDir, "skills");
  for (const skill of await readDirents(skillsDir)) {
    if (
      skill.isDirectory() &&
      (await pathExists(path.join(skillsDir, skill.name, "SKILL.md")))
    ) {
      content.skills.push(skill.name);
    }
  }

  content.hooks = (await readDirents(path.join(sourceDir, "hooks", "library")))
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name);

  return content;
};

/**
 * Build the desired item for one private identifier
 * @param args - Item arguments
 * @param args.sourceDir - Private source directory
 * @param args.prefix - Source prefix
 * @param args.category - Content category
 * @param args.identifier - Identifier as discovered
 *
 * @returns Desired item named `<prefix>-<basename(identifier)>`
 */
export const privateItem = (args: {
  sourceDir: string;
  prefix: string;
  category: DeployCategory;
  identifier: string;
}): DesiredItem => {
  const { sourceDir, prefix, category, identifier } = args;
  const destName = `${prefix}-${path.posix.basename(identifier)}`;

  switch (category) {
    case "rules":
      return {
        identifier,
        destName,
        sourcePath: path.join(sourceDir, "rule-library", ...identifier.split("/")),
        shape: "file",
        executable: false,
      };
    case "skills":
      return {
        identifier,
        destName,
        sourcePath: path.join(sourceDir, "skills", identifier),
        shape: "directory",
        executable: false,
      };
    case "hooks":
      return {
        identifier,
        destName,
        sourcePath: path.join(sourceDir, "hooks", "library", identifier),
        shape: "file",
        executable: true,
      };
    case "commands":
    case "agents":
      return {
        identifier,
        destName,
        sourcePath: path.join(sourceDir, category, identifier),
        shape: "file",
        executable: false,
      };
  }
};

/**
 * Copy the selected items of a private source into the project
 * @param args - Deploy arguments
 * @param args.projectDir - Project root
 * @param args.sourceDir - Private source directory
 * @param args.prefix - Source prefix
 * @param args.selections - Identifiers to deploy per category
 *
 * @returns Deployed identifiers (missing sources excluded) and per-category reports
 */
export const deployPrivateSource = async (args: {
  projectDir: string;
  sourceDir: string;
  prefix: string;
  selections: PrivateSelections;
}): Promise<PrivateDeployReport> => {
  const { projectDir, sourceDir, prefix, selections } = args;
  const deployed = emptyPrivateSelections();
  const reports: Array<DeploymentReport> = [];

  for (const category of PRIVATE_CATEGORIES) {
    const report = createReport({ category });
    const categoryDir = getCategoryDir({ projectDir, category });

    for (const identifier of selections[category]) {
      const item = privateItem({ sourceDir, prefix, category, identifier });
      try {
        const outcome = await deployItem({ item, categoryDir });
        if (outcome === "missing-source") {
          report.warnings.push({
            type: "skipped-missing-source",
            identifier,
            sourcePath: item.sourcePath,
          });
          continue;
        }
        deployed[category].push(identifier);
        report.deployed.push({ identifier, destName: item.destName });
      } catch (err) {
        report.errors.push({
          identifier,
          destPath: path.join(categoryDir, item.destName),
          message: describeError(err),
        });
      }
    }

    reports.push(report);
  }

  return { prefix, deployed, reports };
};

/**
 * Remove every entry a prefix owns from the project's category directories
 *
 * An entry that cannot be removed is recorded in its category's report and
 * the remaining entries are still processed.
 *
 * @param args - Clean arguments
 * @param args.projectDir - Project root
 * @param args.prefix - Prefix whose entries are removed
 * @param args.registeredPrefixes - All registered prefixes (overlapping prefixes keep their own entries)
 *
 * @returns Removed paths and the per-category reports
 */
export const cleanPrivateFiles = async (args: {
  projectDir: string;
  prefix: string;
  registeredPrefixes?: Iterable<string> | null;
}): Promise<PrivateCleanResult> => {
  const { projectDir, prefix } = args;
  const policy = createOwnershipPolicy({
    privatePrefixes: [prefix, ...(args.registeredPrefixes ?? [])],
  });
  const owner = { type: "private", prefix } as const;
  const removed: Array<string> = [];
  const reports: Array<DeploymentReport> = [];

  for (const category of PRIVATE_CATEGORIES) {
    const categoryDir = getCategoryDir({ projectDir, category });
    const report = createReport({ category });

    for (const name of await listVisibleEntries(categoryDir)) {
      const ownership = classifyEntry({ category, name, policy });
      if (!isOwnedBy({ ownership, owner })) {
        continue;
      }
      const entryPath = path.join(categoryDir, name);
      try {
        await fs.rm(entryPath, { recursive: true, force: true });
      } catch (err) {
        report.errors.push({
          identifier: name,
          destPath: entryPath,
          message: describeError(err),
        });
        continue;
      }
      removed.push(entryPath);
      report.removed.push(name);
      debug({ message: `Removed ${entryPath}` });
    }

    if (report.removed.length > 0 || report.errors.length > 0) {
      reports.push(report);
    }
  }

  return { removed, reports };
};

/**
 * Clean and redeploy every registered private source
 *
 * A source whose directory no longer exists is left alone: its deployed
 * entries stay in place and its report is empty.
 *
 * @param args - Redeploy arguments
 * @param args.projectDir - Project root
 * @param args.sources - Registered private sources
 *
 * @returns One report per source, in order
 */
export const redeployPrivateSources = async (args: {
  projectDir: string;
  sources: ReadonlyArray<PrivateSourceRef>;
}): Promise<Array<PrivateDeployReport>> => {
  const { projectDir, sources } = args;
  const registeredPrefixes = sources.map((source) => source.prefix);
  const results: Array<PrivateDeployReport> = [];

  for (const source of sources) {
    if (!(await pathExists(source.sourcePath))) {
      results.push({
        prefix: source.prefix,
        deployed: emptyPrivateSelections(),
        reports: [],
      });
      continue;
    }

    const cleaned = await cleanPrivateFiles({
      projectDir,
      prefix: source.prefix,
      registeredPrefixes,
    });
    const deployed = await deployPrivateSource({
      projectDir,
      sourceDir: source.sourcePath,
      prefix: source.prefix,
      selections: source.selections,
    });
    results.push({
      ...deployed,
      reports: [...cleaned.reports, ...deployed.reports],
    });
  }

  return results;
};

/**
 * Validate a prefix and throw when it is rejected
 * @param args - Validation arguments
 * @param args.prefix - Candidate prefix
 * @param args.existingPrefixes - Registered prefixes
 * @param args.reserved - Reserved names
 *
 * @throws ValidationError with the rejection message
 */
export const assertValidPrefix = (args: {
  prefix: string;
  existingPrefixes: Iterable<string>;
  reserved: Iterable<string>;
}): void => {
  const message = validatePrefix(
    args.prefix,
    args.existingPrefixes,
    args.reserved,
  );
  if (message != null) {
    throw new ValidationError(message);
  }
};
