/**
 * Reconciliation of category directories against a desired item set
 *
 * A pass copies every desired item into its category directory, then removes
 * the entries it owns that are no longer desired. Entries owned by someone
 * else are reported and left alone. A failing item is recorded in the report
 * and the pass moves on to the next one.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { describeError } from "@/cli/errors.js";
import {
  classifyEntry,
  isOwnedBy,
} from "@/cli/features/ownership/ownership.js";
import { DEPLOY_CATEGORIES, getCategoryDir } from "@/cli/features/paths.js";
import { debug } from "@/cli/logger.js";
import {
  copyDirRecursive,
  discardTemp,
  getTempSibling,
} from "@/utils/fs.js";

import type {
  OwnershipPolicy,
  PassOwner,
} from "@/cli/features/ownership/ownership.js";
import type { DeployCategory } from "@/cli/features/paths.js";
import type { DeploymentReport, DesiredItem } from "./types.js";
import type { Stats } from "fs";

export type DeployOutcome = "deployed" | "missing-source";

const statOrNull = async (args: {
  filePath: string;
  follow: boolean;
}): Promise<Stats | null> => {
  const { filePath, follow } = args;
  try {
    return follow ? await fs.stat(filePath) : await fs.lstat(filePath);
  } catch {
    return null;
  }
};

/**
 * List the visible entries of a directory
 * @param dir - Directory to list
 *
 * @returns Sorted entry names, empty when the directory does not exist
 */
export const listVisibleEntries = async (
  dir: string,
): Promise<Array<string>> => {
  try {
    const names = await fs.readdir(dir);
    return names.filter((name) => !name.startsWith(".")).sort();
  } catch {
    return [];
  }
};

export const createReport = (args: {
  category: DeployCategory;
}): DeploymentReport => {
  return {
    category: args.category,
    deployed: [],
    removed: [],
    warnings: [],
    errors: [],
  };
};

/**
 * Copy one item into a category directory
 *
 * The item is first written to a hidden temporary sibling and then renamed
 * into place, so the destination never holds a partial copy. A directory item
 * replaces the existing directory of the same name entirely.
 *
 * @param args - Deploy arguments
 * @param args.item - Item to copy
 * @param args.categoryDir - Destination category directory
 *
 * @throws When the destination cannot be written
 *
 * @returns "missing-source" when the source is absent or not of the item's shape
 */
export const deployItem = async (args: {
  item: DesiredItem;
  categoryDir: string;
}): Promise<DeployOutcome> => {
  const { item, categoryDir } = args;

  const source = await statOrNull({ filePath: item.sourcePath, follow: true });
  if (
    source == null ||
    (item.shape === "file" && !source.isFile()) ||
    (item.shape === "directory" && !source.isDirectory())
  ) {
    return "missing-source";
  }

  await fs.mkdir(categoryDir, { recursive: true });
  const destPath = path.join(categoryDir, item.destName);
  const tmpPath = getTempSibling(destPath);

  try {
    if (item.shape === "file") {
      await fs.copyFile(item.sourcePath, tmpPath);
      if (item.executable) {
        await fs.chmod(tmpPath, source.mode | 0o111);
      }
    } else {
      await copyDirRecursive({ src: item.sourcePath, dest: tmpPath });
    }

    const existing = await statOrNull({ filePath: destPath, follow: false });
    if (
      existing != null &&
      (item.shape === "directory" || existing.isDirectory())
    ) {
      await fs.rm(destPath, { recursive: true, force: true });
    }

    await fs.rename(tmpPath, destPath);
  } catch (err) {
    await discardTemp(tmpPath);
    throw err;
  }

  return "deployed";
};

/**
 * Reconcile one category directory against a desired item set
 * @param args - Reconcile arguments
 * @param args.category - Category being reconciled
 * @param args.categoryDir - Destination directory of the category
 * @param args.desired - Items that must be present after the pass
 * @param args.policy - Ownership policy used to decide what may be removed
 * @param args.owner - Namespace the pass runs for
 *
 * @returns Report of what was deployed, removed, skipped and failed
 */
export const reconcileCategory = async (args: {
  category: DeployCategory;
  categoryDir: string;
  desired: ReadonlyArray<DesiredItem>;
  policy: OwnershipPolicy;
  owner: PassOwner;
}): Promise<DeploymentReport> => {
  const { category, categoryDir, desired, policy, owner } = args;
  const report = createReport({ category });
  const desiredNames = new Set(desired.map((item) => item.destName));

  for (const item of desired) {
    try {
      const outcome = await deployItem({ item, categoryDir });
      if (outcome === "missing-source") {
        report.warnings.push({
          type: "skipped-missing-source",
          identifier: item.identifier,
          sourcePath: item.sourcePath,
        });
        continue;
      }
      report.deployed.push({
        identifier: item.identifier,
        destName: item.destName,
      });
    } catch (err) {
      report.errors.push({
        identifier: item.identifier,
        destPath: path.join(categoryDir, item.destName),
        message: describeError(err),
      });
    }
  }

  for (const name of await listVisibleEntries(categoryDir)) {
    if (desiredNames.has(name)) {
      continue;
    }

    const ownership = classifyEntry({ category, name, policy });
    if (!isOwnedBy({ ownership, owner })) {
      report.warnings.push({ type: "skipped-protected", name, ownership });
      continue;
    }

    const entryPath = path.join(categoryDir, name);
    try {
      await fs.rm(entryPath, { recursive: true, force: true });
      report.removed.push(name);
      debug({ message: `Removed ${entryPath}` });
    } catch (err) {
      report.errors.push({
        identifier: name,
        destPath: entryPath,
        message: describeError(err),
      });
    }
  }

  return report;
};

/**
 * Reconcile every category of a project for the registry namespace
 * @param args - Reconcile arguments
 * @param args.projectDir - Project root
 * @param args.plan - Desired items per category
 * @param args.policy - Ownership policy
 *
 * @returns One report per category, in category order
 */
export const reconcileProject = async (args: {
  projectDir: string;
  plan: Readonly<Record<DeployCategory, ReadonlyArray<DesiredItem>>>;
  policy: OwnershipPolicy;
}): Promise<Array<DeploymentReport>> => {
  const { projectDir, plan, policy } = args;
  const reports: Array<DeploymentReport> = [];

  for (const category of DEPLOY_CATEGORIES) {
    reports.push(
      await reconcileCategory({
        category,
        categoryDir: getCategoryDir({ projectDir, category }),
        desired: plan[category],
        policy,
        owner: { type: "registry" },
      }),
    );
  }

  return reports;
};

export const hasWriteErrors = (args: {
  reports: ReadonlyArray<DeploymentReport>;
}): boolean => {
  return args.reports.some((report) => report.errors.length > 0);
};
