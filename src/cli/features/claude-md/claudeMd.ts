/**
 * Writing the generated block into the project's CLAUDE.md
 *
 * The decision is taken before anything is deployed (planHeaderUpdate), so
 * declining leaves the project untouched. The write itself happens at the
 * end of the run (applyHeader).
 */

import * as fs from "fs/promises";

import {
  getClaudeMdBackupFile,
  getClaudeMdFile,
} from "@/cli/features/paths.js";
import { warn } from "@/cli/logger.js";
import { writeFileAtomic } from "@/utils/fs.js";

import type { SelectionResolver } from "@/cli/features/selection/types.js";

import {
  createDocument,
  hasBlock,
  spliceUpdate,
  splicePrepend,
} from "./header.js";

export type HeaderPlan =
  | { action: "create" }
  | { action: "update" }
  | { action: "replace" }
  | { action: "merge" }
  /** Non-interactive run on a CLAUDE.md without the block, no --force */
  | { action: "skip" }
  | { action: "quit" };

export type HeaderOutcome =
  | "created"
  | "updated"
  | "unchanged"
  | "replaced"
  | "merged";

const readOrNull = async (filePath: string): Promise<Buffer | null> => {
  try {
    return await fs.readFile(filePath);
  } catch {
    return null;
  }
};

/**
 * Decide what to do with the project's CLAUDE.md
 * @param args - Planning arguments
 * @param args.projectDir - Project root
 * @param args.resolver - Asked when an interactive run meets a CLAUDE.md without the block
 * @param args.force - Merge without asking on non-interactive runs
 *
 * @returns Header plan
 */
export const planHeaderUpdate = async (args: {
  projectDir: string;
  resolver: SelectionResolver;
  force: boolean;
}): Promise<HeaderPlan> => {
  const { projectDir, resolver, force } = args;
  const claudeMdPath = getClaudeMdFile({ projectDir });

  const existing = await readOrNull(claudeMdPath);
  if (existing == null) {
    return { action: "create" };
  }
  if (hasBlock(existing)) {
    return { action: "update" };
  }

  if (!resolver.interactive) {
    return force ? { action: "merge" } : { action: "skip" };
  }

  const text = existing.toString("utf-8");
  const choice = await resolver.chooseHeaderAction({
    claudeMdPath,
    lines: text.split("\n").length - 1,
    chars: text.length,
  });
  return { action: choice };
};

/**
 * Write the generated block according to a plan
 *
 * Replace and merge save the previous document to CLAUDE.md.old first. The
 * existing document is handled as raw bytes throughout.
 *
 * @param args - Write arguments
 * @param args.projectDir - Project root
 * @param args.projectName - Title for a new document
 * @param args.block - Rendered block
 * @param args.plan - Plan from planHeaderUpdate (skip and quit write nothing)
 *
 * @returns What happened, or null when the plan writes nothing
 */
export const applyHeader = async (args: {
  projectDir: string;
  projectName: string;
  block: string;
  plan: HeaderPlan;
}): Promise<HeaderOutcome | null> => {
  const { projectDir, projectName, block, plan } = args;
  const claudeMdPath = getClaudeMdFile({ projectDir });
  const existing = (await readOrNull(claudeMdPath)) ?? Buffer.alloc(0);

  const backup = async (): Promise<void> => {
    await writeFileAtomic({
      filePath: getClaudeMdBackupFile({ projectDir }),
      content: existing,
    });
  };

  switch (plan.action) {
    case "create":
      await writeFileAtomic({
        filePath: claudeMdPath,
        content: createDocument({ projectName, block }),
      });
      return "created";
    case "update": {
      const updated = spliceUpdate(existing, block);
      if (updated.equals(existing)) {
        if (!existing.includes(block.trim())) {
          warn({
            message: `${claudeMdPath} has a foundry start marker without an end marker; left unchanged`,
          });
        }
        return "unchanged";
      }
      await writeFileAtomic({ filePath: claudeMdPath, content: updated });
      return "updated";
    }
    case "replace":
      await backup();
      await writeFileAtomic({
        filePath: claudeMdPath,
        content: createDocument({ projectName, block }),
      });
      return "replaced";
    case "merge":
      await backup();
      await writeFileAtomic({
        filePath: claudeMdPath,
        content: splicePrepend(existing, block),
      });
      return "merged";
    case "skip":
    case "quit":
      return null;
  }
};
