/**
 * foundry private
 *
 * Registers, lists and removes private content sources of a project.
 */

import * as path from "path";

import { logReports } from "@/cli/commands/reporting.js";
import { resolveConfig } from "@/cli/config.js";
import { ValidationError, describeError } from "@/cli/errors.js";
import { PRIVATE_CATEGORIES } from "@/cli/features/manifest/types.js";
import {
  describePrivateSources,
  registerPrivateSource,
  removePrivateSource,
  type PrivateSourceStatus,
} from "@/cli/features/private-sources/registration.js";
import { emptyPrivateSelections } from "@/cli/features/private-sources/privateSources.js";
import { loadRegistry } from "@/cli/features/registry/registry.js";
import {
  createInteractiveResolver,
  createNonInteractiveResolver,
} from "@/cli/features/selection/resolvers.js";
import { error, info, newline, raw, success, warn } from "@/cli/logger.js";
import { normalizeProjectDir } from "@/utils/path.js";

import type { PrivateSelections } from "@/cli/features/manifest/types.js";
import type { SelectionResolver } from "@/cli/features/selection/types.js";
import type { Command } from "commander";

/**
 * Let the user narrow down the discovered content of a source
 *
 * Every discovered item starts selected. Categories without content are not
 * shown; `back` returns to the previous category.
 *
 * @param args - Selection arguments
 * @param args.prefix - Prefix of the source, shown in the menu titles
 * @param args.available - Discovered content
 * @param args.resolver - Source of answers
 *
 * @throws ValidationError when the user quits
 *
 * @returns Chosen identifiers per category
 */
export const selectPrivateContent = async (args: {
  prefix: string;
  available: PrivateSelections;
  resolver: SelectionResolver;
}): Promise<PrivateSelections> => {
  const { prefix, available, resolver } = args;
  const categories = PRIVATE_CATEGORIES.filter(
    (category) => available[category].length > 0,
  );
  const answers = new Map<string, Array<string>>();

  let index = 0;
  while (index < categories.length) {
    const category = categories[index];
    const result = await resolver.resolve({
      prompt: {
        key: `private:${category}`,
        title: `Private ${category} (${prefix})`,
        options: available[category].map((value) => ({ value })),
        defaults: answers.get(category) ?? available[category],
        required: false,
      },
    });

    if (result.type === "quit") {
      throw new ValidationError("Registration cancelled. No changes made.");
    }
    if (result.type === "back") {
      index = Math.max(0, index - 1);
      continue;
    }
    answers.set(category, result.selected);
    index += 1;
  }

  const chosen = emptyPrivateSelections();
  for (const category of categories) {
    chosen[category] = answers.get(category) ?? [];
  }
  return chosen;
};

/**
 * Format the listing of registered private sources
 * @param statuses - Sources as described by describePrivateSources
 *
 * @returns Output lines
 */
export const formatPrivateSources = (
  statuses: ReadonlyArray<PrivateSourceStatus>,
): Array<string> => {
  if (statuses.length === 0) {
    return ["No private sources registered."];
  }

  const lines = [`${statuses.length} private source(s) registered:`, ""];
  for (const source of statuses) {
    const counts = PRIVATE_CATEGORIES.map((category) => ({
      category,
      count: source.entries.filter((entry) => entry.category === category)
        .length,
    }))
      .filter(({ count }) => count > 0)
      .map(({ category, count }) => `${count} ${category}`);

    lines.push(`  [${source.prefix}] ${source.sourcePath}`);
    lines.push(`    Status: ${source.status === "ok" ? "OK" : "MISSING"}`);
    lines.push(
      `    Deployed: ${counts.length > 0 ? counts.join(", ") : "no items"}`,
    );
    for (const entry of source.entries) {
      lines.push(`      ${entry.category}: ${entry.name}`);
    }
    lines.push("");
  }
  return lines;
};

/**
 * Register a private source and deploy it
 * @param args - Command arguments
 * @param args.projectDir - Project root
 * @param args.sourceDir - Private source directory
 * @param args.prefix - Namespace prefix
 * @param args.contentRoot - Content root (for reserved names)
 * @param args.resolver - Chooses the content to deploy
 *
 * @returns Number of entries that could not be written
 */
export const runPrivateAdd = async (args: {
  projectDir: string;
  sourceDir: string;
  prefix: string;
  contentRoot: string;
  resolver: SelectionResolver;
}): Promise<number> => {
  const { projectDir, sourceDir, prefix, contentRoot, resolver } = args;
  const registry = await loadRegistry({ contentRoot });

  const { ref, report } = await registerPrivateSource({
    projectDir,
    sourceDir,
    prefix,
    registry,
    select: resolver.interactive
      ? ({ available }) => selectPrivateContent({ prefix, available, resolver })
      : null,
  });

  const writeErrors = logReports({ reports: report.reports });
  success({ message: `Registered private source [${ref.prefix}] ${ref.sourcePath}` });
  for (const category of PRIVATE_CATEGORIES) {
    if (report.deployed[category].length > 0) {
      raw({ message: `  ${category}: ${report.deployed[category].length}` });
    }
  }
  return writeErrors;
};

/**
 * Print the registered private sources
 * @param args - Command arguments
 * @param args.projectDir - Project root
 */
export const runPrivateList = async (args: {
  projectDir: string;
}): Promise<void> => {
  for (const line of formatPrivateSources(await describePrivateSources(args))) {
    raw({ message: line });
  }
};

/**
 * Unregister a private source and delete what it deployed
 * @param args - Command arguments
 * @param args.projectDir - Project root
 * @param args.prefix - Prefix of the source
 *
 * @returns Removed paths, relative to the project root, and the number of entries that could not be removed
 */
export const runPrivateRemove = async (args: {
  projectDir: string;
  prefix: string;
}): Promise<{ removed: Array<string>; writeErrors: number }> => {
  const { projectDir, prefix } = args;
  info({ message: `Removing private source: ${prefix}` });

  const cleaned = await removePrivateSource({ projectDir, prefix });
  const removed = cleaned.removed.map((entry) =>
    path.relative(projectDir, entry),
  );
  for (const entry of removed) {
    raw({ message: `  Removed: ${entry}` });
  }

  const writeErrors = logReports({ reports: cleaned.reports });
  newline();
  if (writeErrors > 0) {
    warn({
      message: `Private source '${prefix}' is still registered: ${writeErrors} entries could not be removed`,
    });
  } else {
    success({
      message: `Removed ${removed.length} files/directories with prefix '${prefix}'`,
    });
  }
  return { removed, writeErrors };
};

const fail = (err: unknown): never => {
  error({ message: describeError(err) });
  process.exit(1);
};

/**
 * Register the 'private' command group with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerPrivateCommand = (args: { program: Command }): void => {
  const { program } = args;

  const group = program
    .command("private")
    .description("Manage private content sources of a project");

  group
    .command("add")
    .description("Register a private source and deploy its content")
    .argument("<sourceDir>", "Directory holding the private content")
    .requiredOption("-p, --prefix <prefix>", "Namespace prefix for its entries")
    .option("-d, --project-dir <path>", "Project directory (default: current directory)")
    .option("-n, --non-interactive", "Deploy everything the source holds")
    .option("--content-root <path>", "Content root holding registry.json")
    .action(
      async (
        sourceDir: string,
        options: {
          prefix: string;
          projectDir?: string;
          nonInteractive?: boolean;
          contentRoot?: string;
        },
      ) => {
        try {
          const config = resolveConfig({
            projectDir: options.projectDir ?? null,
            contentRoot: options.contentRoot ?? null,
            nonInteractive: options.nonInteractive ?? null,
          });
          const writeErrors = await runPrivateAdd({
            projectDir: config.projectDir,
            sourceDir,
            prefix: options.prefix,
            contentRoot: config.contentRoot,
            resolver: config.interactive
              ? createInteractiveResolver()
              : createNonInteractiveResolver(),
          });
          if (writeErrors > 0) {
            warn({ message: `${writeErrors} entries could not be updated` });
            process.exit(1);
          }
        } catch (err) {
          fail(err);
        }
      },
    );

  group
    .command("list")
    .description("List registered private sources")
    .option("-d, --project-dir <path>", "Project directory (default: current directory)")
    .action(async (options: { projectDir?: string }) => {
      try {
        await runPrivateList({
          projectDir: normalizeProjectDir({ projectDir: options.projectDir }),
        });
      } catch (err) {
        fail(err);
      }
    });

  group
    .command("remove")
    .description("Unregister a private source and delete its entries")
    .argument("<prefix>", "Prefix of the source to remove")
    .option("-d, --project-dir <path>", "Project directory (default: current directory)")
    .action(async (prefix: string, options: { projectDir?: string }) => {
      try {
        const { writeErrors } = await runPrivateRemove({
          projectDir: normalizeProjectDir({ projectDir: options.projectDir }),
          prefix,
        });
        if (writeErrors > 0) {
          process.exit(1);
        }
      } catch (err) {
        fail(err);
      }
    });
};
