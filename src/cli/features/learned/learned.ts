/**
 * Learned skills
 *
 * Learned skills are markdown notes grouped by category. The shipped ones go
 * to `.claude/skills/learned/<category>/`; the project's own notes live in
 * `learned-local/`, which foundry never writes to.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { describeError } from "@/cli/errors.js";
import {
  getLearnedLocalSkillsDir,
  getLearnedSkillsDir,
} from "@/cli/features/paths.js";
import { contentPaths } from "@/cli/features/registry/registry.js";
import { createReport, deployItem } from "@/cli/features/reconcile/reconcile.js";
import { warn } from "@/cli/logger.js";
import { pathExists } from "@/utils/fs.js";

import type { DeploymentReport } from "@/cli/features/reconcile/types.js";
import type { Registry } from "@/cli/features/registry/types.js";

export type LearnedConflict = {
  category: string;
  file: string;
};

export type LearnedDeployResult = {
  report: DeploymentReport;
  conflicts: Array<LearnedConflict>;
};

const listMarkdownFiles = async (dir: string): Promise<Array<string>> => {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
};

/**
 * Copy the selected learned skill categories into the project
 *
 * Files already deployed are overwritten; nothing is removed. A file that
 * also exists in `learned-local/<category>/` is copied anyway and reported
 * as a conflict.
 *
 * @param args - Deploy arguments
 * @param args.projectDir - Project root
 * @param args.registry - Content registry
 * @param args.categories - Selected categories
 *
 * @returns Report of the copies and the conflicts found
 */
export const deployLearnedSkills = async (args: {
  projectDir: string;
  registry: Registry;
  categories: ReadonlyArray<string>;
}): Promise<LearnedDeployResult> => {
  const { projectDir, registry, categories } = args;
  const report = createReport({ category: "skills" });
  const conflicts: Array<LearnedConflict> = [];

  const learnedDir = getLearnedSkillsDir({ projectDir });
  const localDir = getLearnedLocalSkillsDir({ projectDir });

  for (const category of categories) {
    const sourceDir = contentPaths.learnedCategory({ registry, name: category });
    const categoryDir = path.join(learnedDir, category);

    for (const file of await listMarkdownFiles(sourceDir)) {
      const identifier = `learned/${category}/${file}`;

      if (await pathExists(path.join(localDir, category, file))) {
        conflicts.push({ category, file });
        warn({
          message: `Conflict: ${file} exists in both learned/ and learned-local/${category}/`,
        });
      }

      try {
        await deployItem({
          item: {
            identifier,
            destName: file,
            sourcePath: path.join(sourceDir, file),
            shape: "file",
            executable: false,
          },
          categoryDir,
        });
        report.deployed.push({ identifier, destName: file });
      } catch (err) {
        report.errors.push({
          identifier,
          destPath: path.join(categoryDir, file),
          message: describeError(err),
        });
      }
    }
  }

  return { report, conflicts };
};
