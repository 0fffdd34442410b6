/**
 * Paths inside a configured project
 */

import * as path from "path";

/**
 * Categories of deployable content, one destination directory each
 */
export const DEPLOY_CATEGORIES = [
  "rules",
  "agents",
  "commands",
  "skills",
  "hooks",
] as const;

export type DeployCategory = (typeof DEPLOY_CATEGORIES)[number];

export const getClaudeDir = (args: { projectDir: string }): string => {
  return path.join(args.projectDir, ".claude");
};

/**
 * Get the destination directory of a content category
 * @param args - Path arguments
 * @param args.projectDir - Project root
 * @param args.category - Content category
 *
 * @returns Absolute path to the category directory (hooks live in hooks/library)
 */
export const getCategoryDir = (args: {
  projectDir: string;
  category: DeployCategory;
}): string => {
  const { projectDir, category } = args;
  const claudeDir = getClaudeDir({ projectDir });
  if (category === "hooks") {
    return path.join(claudeDir, "hooks", "library");
  }
  return path.join(claudeDir, category);
};

export const getManifestPath = (args: { projectDir: string }): string => {
  return path.join(getClaudeDir(args), "setup-manifest.json");
};

export const getVersionFile = (args: { projectDir: string }): string => {
  return path.join(getClaudeDir(args), "VERSION");
};

export const getSettingsFile = (args: { projectDir: string }): string => {
  return path.join(getClaudeDir(args), "settings.json");
};

export const getLearnedSkillsDir = (args: { projectDir: string }): string => {
  return path.join(getCategoryDir({ ...args, category: "skills" }), "learned");
};

export const getLearnedLocalSkillsDir = (args: {
  projectDir: string;
}): string => {
  return path.join(
    getCategoryDir({ ...args, category: "skills" }),
    "learned-local",
  );
};

export const getClaudeMdFile = (args: { projectDir: string }): string => {
  return path.join(args.projectDir, "CLAUDE.md");
};

export const getMcpFile = (args: { projectDir: string }): string => {
  return path.join(args.projectDir, ".claude.json");
};

export const getClaudeMdBackupFile = (args: { projectDir: string }): string => {
  return path.join(args.projectDir, "CLAUDE.md.old");
};
