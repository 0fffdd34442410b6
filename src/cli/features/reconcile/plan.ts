/**
 * Desired item sets for a registry pass
 */

import { contentPaths } from "@/cli/features/registry/registry.js";

import type { DeployCategory } from "@/cli/features/paths.js";
import type { Registry } from "@/cli/features/registry/types.js";
import type { DesiredItem } from "./types.js";

/**
 * What the user selected from the registry
 */
export type RegistrySelections = {
  baseRules: ReadonlyArray<string>;
  modularRules: Readonly<Record<string, ReadonlyArray<string>>>;
  hooks: ReadonlyArray<string>;
  agents: ReadonlyArray<string>;
  skills: ReadonlyArray<string>;
};

export type DeploymentPlan = Record<DeployCategory, Array<DesiredItem>>;

const fileItem = (args: {
  identifier: string;
  destName?: string | null;
  sourcePath: string;
  executable?: boolean | null;
}): DesiredItem => {
  const { identifier, destName, sourcePath, executable } = args;
  return {
    identifier,
    destName: destName ?? identifier,
    sourcePath,
    shape: "file",
    executable: executable ?? false,
  };
};

/**
 * Compute the modular rule file names after collision handling
 *
 * A modular rule whose name is already taken by a selected base rule, or by a
 * modular rule of an earlier category, is deployed as `<category>-<name>`.
 *
 * @param args - Planning arguments
 * @param args.registry - Content registry (for category order)
 * @param args.selections - Selected rules
 *
 * @returns Deployed rule entries as category, identifier and destination name
 */
export const planRuleNames = (args: {
  registry: Registry;
  selections: Pick<RegistrySelections, "baseRules" | "modularRules">;
}): Array<{ category: string | null; identifier: string; destName: string }> => {
  const { registry, selections } = args;
  const taken = new Set(selections.baseRules);
  const result: Array<{
    category: string | null;
    identifier: string;
    destName: string;
  }> = selections.baseRules.map((identifier) => ({
    category: null,
    identifier,
    destName: identifier,
  }));

  const knownCategories = Object.keys(registry.modularRules);
  const extraCategories = Object.keys(selections.modularRules)
    .filter((category) => !knownCategories.includes(category))
    .sort();

  for (const category of [...knownCategories, ...extraCategories]) {
    for (const identifier of selections.modularRules[category] ?? []) {
      const destName = taken.has(identifier)
        ? `${category}-${identifier}`
        : identifier;
      taken.add(destName);
      result.push({ category, identifier, destName });
    }
  }

  return result;
};

/**
 * Build the desired items of every category for a registry pass
 * @param args - Planning arguments
 * @param args.registry - Content registry
 * @param args.selections - Registry selections of the project
 * @param args.commandFiles - Every command shipped in the content root
 *
 * @returns Desired items per category
 */
export const planRegistryDeployment = (args: {
  registry: Registry;
  selections: RegistrySelections;
  commandFiles: ReadonlyArray<string>;
}): DeploymentPlan => {
  const { registry, selections, commandFiles } = args;

  const rules = planRuleNames({ registry, selections }).map((rule) =>
    fileItem({
      identifier:
        rule.category == null
          ? rule.identifier
          : `${rule.category}/${rule.identifier}`,
      destName: rule.destName,
      sourcePath:
        rule.category == null
          ? contentPaths.baseRule({ registry, name: rule.identifier })
          : contentPaths.modularRule({
              registry,
              category: rule.category,
              name: rule.identifier,
            }),
    }),
  );

  const agents = selections.agents.map((name) =>
    fileItem({
      identifier: name,
      sourcePath: contentPaths.agent({ registry, name }),
    }),
  );

  const commands = commandFiles.map((name) =>
    fileItem({
      identifier: name,
      sourcePath: contentPaths.command({ registry, name }),
    }),
  );

  const skills: Array<DesiredItem> = selections.skills.map((name) => ({
    identifier: name,
    destName: name,
    sourcePath: contentPaths.skill({ registry, name }),
    shape: "directory",
    executable: false,
  }));

  const hooks = selections.hooks.map((name) =>
    fileItem({
      identifier: name,
      sourcePath: contentPaths.hook({ registry, name }),
      executable: true,
    }),
  );

  return { rules, agents, commands, skills, hooks };
};

/**
 * List the rule names as they end up in `.claude/rules`
 * @param args - Planning arguments
 * @param args.registry - Content registry
 * @param args.selections - Selected rules
 *
 * @returns Deployed rule file names
 */
export const getDeployedRuleNames = (args: {
  registry: Registry;
  selections: Pick<RegistrySelections, "baseRules" | "modularRules">;
}): Array<string> => {
  return planRuleNames(args).map((rule) => rule.destName);
};
