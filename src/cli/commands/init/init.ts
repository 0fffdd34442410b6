/**
 * foundry init
 *
 * Configures (or reconfigures) a project's .claude/ directory from the
 * content root. Every prompt is answered before the first write, so quitting
 * leaves the project as it was.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { logReports } from "@/cli/commands/reporting.js";
import { resolveConfig, type Config } from "@/cli/config.js";
import { describeError } from "@/cli/errors.js";
import {
  applyHeader,
  planHeaderUpdate,
  type HeaderOutcome,
} from "@/cli/features/claude-md/claudeMd.js";
import { renderBlock } from "@/cli/features/claude-md/header.js";
import { detectProject } from "@/cli/features/detection/detect.js";
import { deployLearnedSkills } from "@/cli/features/learned/learned.js";
import {
  createManifest,
  loadManifest,
  saveManifest,
  type ProjectSelections,
} from "@/cli/features/manifest/manifest.js";
import {
  migrateManifest,
  needsMigration,
} from "@/cli/features/manifest/migration.js";
import { createOwnershipPolicy } from "@/cli/features/ownership/ownership.js";
import { getVersionFile } from "@/cli/features/paths.js";
import { redeployPrivateSources } from "@/cli/features/private-sources/privateSources.js";
import {
  getDeployedRuleNames,
  planRegistryDeployment,
} from "@/cli/features/reconcile/plan.js";
import { reconcileProject } from "@/cli/features/reconcile/reconcile.js";
import {
  listAgentFiles,
  listCommandFiles,
  listLearnedCategories,
  loadRegistry,
} from "@/cli/features/registry/registry.js";
import {
  createInteractiveResolver,
  createNonInteractiveResolver,
} from "@/cli/features/selection/resolvers.js";
import { resolveSelections } from "@/cli/features/selection/selection.js";
import { loadMcpCatalog, writeMcpServers } from "@/cli/features/settings/mcp.js";
import {
  generateSettings,
  writeSettings,
} from "@/cli/features/settings/settings.js";
import {
  error,
  info,
  newline,
  raw,
  success,
  warn,
  brightCyan,
  boldWhite,
} from "@/cli/logger.js";
import {
  compareConfiguredVersion,
  getCurrentPackageVersion,
} from "@/cli/version.js";
import { writeFileAtomic } from "@/utils/fs.js";

import type { DeploymentReport } from "@/cli/features/reconcile/types.js";
import type { SelectionResolver } from "@/cli/features/selection/types.js";
import type { Command } from "commander";

export type InitResult =
  | {
      status: "configured";
      selections: ProjectSelections;
      reports: Array<DeploymentReport>;
      header: HeaderOutcome | null;
      /** Number of entries that could not be written */
      writeErrors: number;
    }
  /** The user declined or the project is newer than this package */
  | { status: "aborted"; reason: string }
  /** Non-interactive run on a CLAUDE.md without the foundry block */
  | { status: "skipped"; reason: string };

const readConfiguredVersion = async (
  projectDir: string,
): Promise<string | null> => {
  try {
    const content = await fs.readFile(getVersionFile({ projectDir }), "utf-8");
    return content.trim();
  } catch {
    return null;
  }
};

/**
 * Ask whether a project that already has a VERSION should be touched
 * @param args - Check arguments
 * @param args.projectDir - Project root
 * @param args.version - Version of the running package
 * @param args.resolver - Answers the confirmation
 *
 * @returns Reason to stop, or null to continue
 */
const checkConfiguredVersion = async (args: {
  projectDir: string;
  version: string;
  resolver: SelectionResolver;
}): Promise<string | null> => {
  const { projectDir, version, resolver } = args;
  const configured = await readConfiguredVersion(projectDir);
  if (configured == null) {
    return null;
  }

  const change = compareConfiguredVersion({ configured, current: version });
  if (change === "downgrade") {
    return `Project version (${configured}) is newer than foundry (${version}). Aborting.`;
  }
  if (!resolver.interactive) {
    return null;
  }

  const proceed =
    change === "same"
      ? await resolver.confirm({
          message: "Already configured with current version. Reconfigure?",
          defaultValue: false,
        })
      : await resolver.confirm({
          message: `Project configured with ${configured}, foundry is ${version}. Update?`,
          defaultValue: true,
        });

  return proceed ? null : "Cancelled.";
};

const printSummary = (args: {
  version: string;
  selections: ProjectSelections;
  commandCount: number;
}): void => {
  const { version, selections, commandCount } = args;
  const modularCount = Object.values(selections.modularSelections).reduce(
    (total, items) => total + items.length,
    0,
  );

  newline();
  success({ message: `✓ Project configured with foundry v${version}` });
  raw({
    message: `  Rules: ${selections.baseSelections.length} base + ${modularCount} modular`,
  });
  raw({ message: `  Hooks: ${selections.hookSelections.length}` });
  raw({ message: `  Commands: ${commandCount}` });
  raw({ message: `  Agents: ${selections.agentSelections.length}` });
  raw({ message: `  Skills: ${selections.skillSelections.length}` });
  if (selections.learnedCategories.length > 0) {
    raw({
      message: `  Learned: ${selections.learnedCategories.length} categories (${selections.learnedCategories.join(", ")})`,
    });
  }
  raw({ message: `  Plugins: ${selections.pluginSelections.length}` });
  raw({ message: `  MCP servers: ${selections.mcpServerSelections.length}` });
};

/**
 * Configure a project
 * @param args - Run arguments
 * @param args.config - Resolved run configuration
 * @param args.resolver - Answers every selection and confirmation
 * @param args.version - Version recorded in VERSION and the manifest
 *
 * @returns What happened to the project
 */
export const runInit = async (args: {
  config: Config;
  resolver: SelectionResolver;
  version: string;
}): Promise<InitResult> => {
  const { config, resolver, version } = args;
  const { projectDir } = config;

  info({ message: boldWhite({ text: `foundry v${version}` }) });
  info({ message: `Project: ${brightCyan({ text: projectDir })}` });
  newline();

  const registry = await loadRegistry({ contentRoot: config.contentRoot });

  const stopReason = await checkConfiguredVersion({
    projectDir,
    version,
    resolver,
  });
  if (stopReason != null) {
    warn({ message: stopReason });
    return { status: "aborted", reason: stopReason };
  }

  let manifest = await loadManifest({ projectDir });
  if (manifest != null && needsMigration({ manifest, registry })) {
    info({
      message: `Migrating manifest from schema ${manifest.schemaVersion} to ${registry.schemaVersion}`,
    });
    manifest = migrateManifest({ manifest, registry });
  }

  info({ message: "Scanning project..." });
  const detected = await detectProject({ projectDir, registry });
  const detectedNames = Object.values(detected)
    .flat()
    .map((item) => item.replace(/\.md$/, ""))
    .sort();
  info({
    message:
      detectedNames.length > 0
        ? `Detected: ${detectedNames.join(", ")}`
        : "Nothing auto-detected.",
  });

  const catalog = await loadMcpCatalog({ registry });
  const commandFiles = await listCommandFiles({ registry });
  const outcome = await resolveSelections({
    context: {
      registry,
      manifest,
      detected,
      agentFiles: await listAgentFiles({ registry }),
      learnedCategories: await listLearnedCategories({ registry }),
      mcpServers: Object.entries(catalog).map(([name, server]) => ({
        name,
        description: server.description ?? "",
      })),
    },
    resolver,
  });
  if (outcome.type === "quit") {
    warn({ message: "Aborted. No changes made." });
    return { status: "aborted", reason: "Selection cancelled." };
  }
  const { selections } = outcome;

  const headerPlan = await planHeaderUpdate({
    projectDir,
    resolver,
    force: config.force,
  });
  if (headerPlan.action === "skip") {
    const reason = "CLAUDE.md exists without the foundry block";
    warn({ message: `${reason}, skipping project` });
    info({
      message: `Run "foundry init ${projectDir}" interactively to add it, or pass --force to merge it.`,
    });
    return { status: "skipped", reason };
  }
  if (headerPlan.action === "quit") {
    warn({ message: "Aborted. No changes made." });
    return { status: "aborted", reason: "CLAUDE.md update declined." };
  }

  newline();
  info({ message: "Generating project configuration..." });

  await writeFileAtomic({
    filePath: getVersionFile({ projectDir }),
    content: `${version}\n`,
  });

  const privateSources = manifest?.privateSources ?? [];
  const registrySelections = {
    baseRules: selections.baseSelections,
    modularRules: selections.modularSelections,
    hooks: selections.hookSelections,
    agents: selections.agentSelections,
    skills: selections.skillSelections,
  };
  const reports = await reconcileProject({
    projectDir,
    plan: planRegistryDeployment({
      registry,
      selections: registrySelections,
      commandFiles,
    }),
    policy: createOwnershipPolicy({
      privatePrefixes: privateSources.map((source) => source.prefix),
    }),
  });

  const learned = await deployLearnedSkills({
    projectDir,
    registry,
    categories: selections.learnedCategories,
  });
  reports.push(learned.report);

  const privateReports = await redeployPrivateSources({
    projectDir,
    sources: privateSources,
  });
  for (const privateReport of privateReports) {
    reports.push(...privateReport.reports);
  }

  await writeSettings({
    projectDir,
    generated: generateSettings({
      registry,
      hooks: selections.hookSelections,
      plugins: selections.pluginSelections,
    }),
    previousPlugins: manifest?.pluginSelections ?? null,
  });
  await writeMcpServers({
    projectDir,
    catalog,
    servers: selections.mcpServerSelections,
  });

  await saveManifest({
    projectDir,
    manifest: createManifest({
      schemaVersion: registry.schemaVersion,
      version,
      contentRoot: registry.contentRoot,
      selections,
      privateSources,
    }),
  });

  const header = await applyHeader({
    projectDir,
    projectName: path.basename(projectDir),
    block: renderBlock({
      registry,
      deployedRules: getDeployedRuleNames({
        registry,
        selections: registrySelections,
      }),
      selectedLanguages: Object.values(selections.modularSelections).flat(),
    }),
    plan: headerPlan,
  });
  if (header === "created") {
    info({ message: "Created CLAUDE.md" });
  } else if (header === "updated") {
    info({ message: "Updated the foundry block in CLAUDE.md" });
  } else if (header === "replaced") {
    info({ message: "Replaced CLAUDE.md (original saved to CLAUDE.md.old)" });
  } else if (header === "merged") {
    info({
      message:
        "Merged the foundry block into CLAUDE.md (original saved to CLAUDE.md.old)",
    });
  }

  const writeErrors = logReports({ reports });
  printSummary({ version, selections, commandCount: commandFiles.length });
  if (writeErrors > 0) {
    error({ message: `${writeErrors} entries could not be updated` });
  }

  return { status: "configured", selections, reports, header, writeErrors };
};

/**
 * Entry point of `foundry init`
 * @param args - Command line values
 * @param args.projectDir - Project directory argument
 * @param args.nonInteractive - Use defaults without prompting
 * @param args.force - Merge into a CLAUDE.md without the foundry block
 * @param args.contentRoot - Content root override
 */
export const main = async (args?: {
  projectDir?: string | null;
  nonInteractive?: boolean | null;
  force?: boolean | null;
  contentRoot?: string | null;
}): Promise<void> => {
  try {
    const config = resolveConfig(args ?? {});
    const result = await runInit({
      config,
      resolver: config.interactive
        ? createInteractiveResolver()
        : createNonInteractiveResolver(),
      version: getCurrentPackageVersion() ?? "unknown",
    });
    if (result.status === "configured" && result.writeErrors > 0) {
      process.exit(1);
    }
  } catch (err) {
    error({ message: describeError(err) });
    process.exit(1);
  }
};

/**
 * Register the 'init' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerInitCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("init")
    .description("Configure a project's .claude/ directory")
    .argument("[projectDir]", "Project directory (default: current directory)")
    .option("-n, --non-interactive", "Use saved or detected selections")
    .option(
      "-f, --force",
      "Merge the foundry block into a CLAUDE.md that lacks it",
    )
    .option("--content-root <path>", "Content root holding registry.json")
    .action(
      async (
        projectDir: string | undefined,
        options: {
          nonInteractive?: boolean;
          force?: boolean;
          contentRoot?: string;
        },
      ) => {
        await main({
          projectDir: projectDir ?? null,
          nonInteractive: options.nonInteractive ?? null,
          force: options.force ?? null,
          contentRoot: options.contentRoot ?? null,
        });
      },
    );
};
