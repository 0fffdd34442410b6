/**
 * foundry status
 *
 * Reports how a project is configured and which enclosing directories carry
 * their own configuration.
 */

import * as fs from "fs/promises";

import { describeError } from "@/cli/errors.js";
import { loadManifest } from "@/cli/features/manifest/manifest.js";
import { getVersionFile } from "@/cli/features/paths.js";
import { describePrivateSources } from "@/cli/features/private-sources/registration.js";
import { error, raw } from "@/cli/logger.js";
import {
  compareConfiguredVersion,
  getCurrentPackageVersion,
  type VersionChange,
} from "@/cli/version.js";
import { getConfiguredDirs, normalizeProjectDir } from "@/utils/path.js";

import type { Manifest } from "@/cli/features/manifest/types.js";
import type { PrivateSourceStatus } from "@/cli/features/private-sources/registration.js";
import type { Command } from "commander";

export type ProjectStatus = {
  projectDir: string;
  /** Version of the running package */
  version: string;
  /** Content of .claude/VERSION */
  configuredVersion: string | null;
  versionChange: VersionChange | null;
  manifest: Manifest | null;
  privateSources: Array<PrivateSourceStatus>;
  /** Configured directories from the project upwards, closest first */
  configuredDirs: Array<string>;
};

const VERSION_NOTES: Record<VersionChange, string> = {
  same: "current",
  upgrade: "update available",
  downgrade: "newer than this foundry",
  unknown: "unrecognised version",
};

const readConfiguredVersion = async (
  projectDir: string,
): Promise<string | null> => {
  try {
    return (await fs.readFile(getVersionFile({ projectDir }), "utf-8")).trim();
  } catch {
    return null;
  }
};

/**
 * Gather the state of a project
 * @param args - Lookup arguments
 * @param args.projectDir - Project root
 * @param args.version - Version of the running package
 *
 * @returns Project status
 */
export const collectStatus = async (args: {
  projectDir: string;
  version: string;
}): Promise<ProjectStatus> => {
  const { projectDir, version } = args;
  const configuredVersion = await readConfiguredVersion(projectDir);

  return {
    projectDir,
    version,
    configuredVersion,
    versionChange:
      configuredVersion == null
        ? null
        : compareConfiguredVersion({
            configured: configuredVersion,
            current: version,
          }),
    manifest: await loadManifest({ projectDir }),
    privateSources: await describePrivateSources({ projectDir }),
    configuredDirs: getConfiguredDirs({ currentDir: projectDir }),
  };
};

/**
 * Format a project status for the terminal
 * @param status - Status from collectStatus
 *
 * @returns Output lines
 */
export const formatStatus = (status: ProjectStatus): Array<string> => {
  const lines = [`foundry v${status.version}`, `Project: ${status.projectDir}`];

  if (status.configuredVersion == null || status.versionChange == null) {
    lines.push("  Not configured. Run \"foundry init\" to set it up.");
  } else {
    lines.push(
      `  Configured version: ${status.configuredVersion} (${VERSION_NOTES[status.versionChange]})`,
    );
  }

  const { manifest } = status;
  if (manifest == null) {
    lines.push("  Manifest: none");
  } else {
    const modularCount = Object.values(manifest.modularSelections).reduce(
      (total, items) => total + items.length,
      0,
    );
    const missing = status.privateSources.filter(
      (source) => source.status === "missing",
    ).length;

    lines.push(
      `  Manifest: schema ${manifest.schemaVersion}, updated ${manifest.updatedAt}`,
    );
    lines.push(`  Content root: ${manifest.contentRoot}`);
    lines.push(
      `  Rules: ${manifest.baseSelections.length} base + ${modularCount} modular`,
    );
    lines.push(
      `  Hooks: ${manifest.hookSelections.length}, Agents: ${manifest.agentSelections.length}, Skills: ${manifest.skillSelections.length}`,
    );
    lines.push(
      `  Private sources: ${status.privateSources.length}${missing > 0 ? ` (${missing} missing)` : ""}`,
    );
  }

  const enclosing = status.configuredDirs.filter(
    (dir) => dir !== status.projectDir,
  );
  if (enclosing.length > 0) {
    lines.push("", "Enclosing configurations:");
    for (const dir of enclosing) {
      lines.push(`  ${dir}`);
    }
  }

  return lines;
};

/**
 * Entry point of `foundry status`
 * @param args - Command line values
 * @param args.projectDir - Project directory argument
 */
export const main = async (args?: {
  projectDir?: string | null;
}): Promise<void> => {
  try {
    const status = await collectStatus({
      projectDir: normalizeProjectDir({ projectDir: args?.projectDir }),
      version: getCurrentPackageVersion() ?? "unknown",
    });
    for (const line of formatStatus(status)) {
      raw({ message: line });
    }
  } catch (err) {
    error({ message: describeError(err) });
    process.exit(1);
  }
};

/**
 * Register the 'status' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerStatusCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("status")
    .description("Show how a project is configured")
    .argument("[projectDir]", "Project directory (default: current directory)")
    .action(async (projectDir: string | undefined) => {
      await main({ projectDir: projectDir ?? null });
    });
};
