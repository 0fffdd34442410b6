/**
 * Registration of private sources in the project manifest
 */

import * as fs from "fs/promises";
import * as path from "path";

import { ValidationError } from "@/cli/errors.js";
import { loadManifest, saveManifest } from "@/cli/features/manifest/manifest.js";
import { PRIVATE_CATEGORIES } from "@/cli/features/manifest/types.js";
import {
  getRegistryEntryNames,
  getReservedPrefixes,
} from "@/cli/features/registry/registry.js";

import type {
  Manifest,
  PrivateSelections,
  PrivateSourceRef,
} from "@/cli/features/manifest/types.js";
import type { DeployCategory } from "@/cli/features/paths.js";
import type { Registry } from "@/cli/features/registry/types.js";

import {
  assertValidPrefix,
  cleanPrivateFiles,
  deployPrivateSource,
  discoverPrivateContent,
} from "./privateSources.js";
import type {
  PrivateCleanResult,
  PrivateDeployReport,
} from "./privateSources.js";

export type PrivateSourceStatus = {
  prefix: string;
  sourcePath: string;
  status: "ok" | "missing";
  /** Entry names the source deploys, per category */
  entries: Array<{ category: DeployCategory; name: string }>;
};

const requireManifest = async (args: {
  projectDir: string;
}): Promise<Manifest> => {
  const manifest = await loadManifest(args);
  if (manifest == null) {
    throw new ValidationError(
      `No setup manifest found in ${args.projectDir}. Run "foundry init" first.`,
    );
  }
  return manifest;
};

const isDirectory = async (dir: string): Promise<boolean> => {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Keep only the selected identifiers that exist in the source
 * @param args - Filter arguments
 * @param args.selections - Requested identifiers
 * @param args.available - Discovered identifiers
 *
 * @returns Selections restricted to available identifiers
 */
export const restrictSelections = (args: {
  selections: PrivateSelections;
  available: PrivateSelections;
}): PrivateSelections => {
  const { selections, available } = args;
  return {
    rules: selections.rules.filter((id) => available.rules.includes(id)),
    commands: selections.commands.filter((id) =>
      available.commands.includes(id),
    ),
    skills: selections.skills.filter((id) => available.skills.includes(id)),
    agents: selections.agents.filter((id) => available.agents.includes(id)),
    hooks: selections.hooks.filter((id) => available.hooks.includes(id)),
  };
};

/**
 * Register a private source and deploy its content
 *
 * Every check runs before the first write, so a rejected registration leaves
 * the project untouched.
 *
 * @param args - Registration arguments
 * @param args.projectDir - Project root
 * @param args.sourceDir - Private source directory
 * @param args.prefix - Namespace prefix for the source
 * @param args.registry - Content registry (for reserved names)
 * @param args.select - Chooses what to deploy from the discovered content (defaults to everything)
 *
 * @throws ValidationError when the manifest is missing, the directory does not exist or the prefix is rejected
 *
 * @returns The stored reference and the deploy report
 */
export const registerPrivateSource = async (args: {
  projectDir: string;
  sourceDir: string;
  prefix: string;
  registry: Registry;
  select?:
    | ((args: { available: PrivateSelections }) => Promise<PrivateSelections>)
    | null;
}): Promise<{ ref: PrivateSourceRef; report: PrivateDeployReport }> => {
  const { projectDir, prefix, registry, select } = args;
  const sourcePath = path.resolve(args.sourceDir);

  const manifest = await requireManifest({ projectDir });

  if (!(await isDirectory(sourcePath))) {
    throw new ValidationError(`Private source directory not found: ${sourcePath}`);
  }

  const existingPrefixes = manifest.privateSources.map(
    (source) => source.prefix,
  );
  assertValidPrefix({
    prefix,
    existingPrefixes,
    reserved: [
      ...getReservedPrefixes({ registry }),
      ...(await getRegistryEntryNames({ registry })),
    ],
  });

  const available = await discoverPrivateContent(sourcePath);
  const selections =
    select == null
      ? available
      : restrictSelections({ selections: await select({ available }), available });

  const cleaned = await cleanPrivateFiles({
    projectDir,
    prefix,
    registeredPrefixes: existingPrefixes,
  });
  const deployed = await deployPrivateSource({
    projectDir,
    sourceDir: sourcePath,
    prefix,
    selections,
  });
  const report: PrivateDeployReport = {
    ...deployed,
    reports: [...cleaned.reports, ...deployed.reports],
  };

  const ref: PrivateSourceRef = { sourcePath, prefix, selections };
  await saveManifest({
    projectDir,
    manifest: {
      ...manifest,
      privateSources: [...manifest.privateSources, ref],
    },
  });

  return { ref, report };
};

/**
 * Unregister a private source and delete everything it deployed
 *
 * When an entry cannot be removed the source stays registered, so a later
 * run still knows the remaining entries belong to it.
 *
 * @param args - Removal arguments
 * @param args.projectDir - Project root
 * @param args.prefix - Prefix of the source to remove
 *
 * @throws ValidationError when the manifest is missing or the prefix is not registered
 *
 * @returns Removed paths and the per-category reports
 */
export const removePrivateSource = async (args: {
  projectDir: string;
  prefix: string;
}): Promise<PrivateCleanResult> => {
  const { projectDir, prefix } = args;
  const manifest = await requireManifest({ projectDir });

  if (!manifest.privateSources.some((source) => source.prefix === prefix)) {
    throw new ValidationError(`No private source with prefix "${prefix}" found`);
  }

  const cleaned = await cleanPrivateFiles({
    projectDir,
    prefix,
    registeredPrefixes: manifest.privateSources.map((source) => source.prefix),
  });
  if (cleaned.reports.some((report) => report.errors.length > 0)) {
    return cleaned;
  }

  await saveManifest({
    projectDir,
    manifest: {
      ...manifest,
      privateSources: manifest.privateSources.filter(
        (source) => source.prefix !== prefix,
      ),
    },
  });

  return cleaned;
};

/**
 * Describe the registered private sources of a project
 * @param args - Lookup arguments
 * @param args.projectDir - Project root
 *
 * @returns One status per source, empty when there is no manifest
 */
export const describePrivateSources = async (args: {
  projectDir: string;
}): Promise<Array<PrivateSourceStatus>> => {
  const manifest = await loadManifest(args);
  if (manifest == null) {
    return [];
  }

  const statuses: Array<PrivateSourceStatus> = [];
  for (const source of manifest.privateSources) {
    const entries: PrivateSourceStatus["entries"] = [];
    for (const category of PRIVATE_CATEGORIES) {
      for (const identifier of source.selections[category]) {
        entries.push({
          category,
          name: `${source.prefix}-${path.posix.basename(identifier)}`,
        });
      }
    }
    statuses.push({
      prefix: source.prefix,
      sourcePath: source.sourcePath,
      status: (await isDirectory(source.sourcePath)) ? "ok" : "missing",
      entries,
    });
  }
  return statuses;
};
