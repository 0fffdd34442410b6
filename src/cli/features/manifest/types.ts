/**
 * Types for the setup manifest
 *
 * The manifest records what a project selected so a later run can reproduce
 * or adjust the deployment. It is rewritten whole after every run.
 */

/**
 * Per-category selections of one private source
 */
export type PrivateSelections = {
  /** Relative paths under rule-library (e.g. "lang/custom-dsp.md") */
  rules: Array<string>;
  commands: Array<string>;
  /** Skill directory names */
  skills: Array<string>;
  agents: Array<string>;
  hooks: Array<string>;
};

export const PRIVATE_CATEGORIES = [
  "rules",
  "commands",
  "skills",
  "agents",
  "hooks",
] as const satisfies ReadonlyArray<keyof PrivateSelections>;

/**
 * One registered external content provider
 */
export type PrivateSourceRef = {
  /** Absolute path of the source directory */
  sourcePath: string;
  /** Namespace prefix of every entry the source deploys */
  prefix: string;
  selections: PrivateSelections;
};

/**
 * Manifest file structure
 */
export type Manifest = {
  /** Registry schema revision the selections are expressed in */
  schemaVersion: number;
  /** Package version of the last run */
  version: string;
  /** Content root of the last run */
  contentRoot: string;
  /** ISO timestamp of the last run */
  updatedAt: string;
  baseSelections: Array<string>;
  /** modular category -> selected items */
  modularSelections: Record<string, Array<string>>;
  hookSelections: Array<string>;
  agentSelections: Array<string>;
  skillSelections: Array<string>;
  learnedCategories: Array<string>;
  pluginSelections: Array<string>;
  mcpServerSelections: Array<string>;
  privateSources: Array<PrivateSourceRef>;
};

/**
 * Manifest layout written by the first release, before schema versioning
 */
export type LegacyManifest = {
  version?: string | null;
  config_repo?: string | null;
  base_rules: Array<string>;
  modular_rules: Record<string, Array<string>>;
  hooks: Array<string>;
  agents: Array<string>;
  skills: Array<string>;
  learned_categories: Array<string>;
  plugins: Array<string>;
  mcp_servers: Array<string>;
  private_sources: Array<{
    path: string;
    prefix: string;
    rules: Array<string>;
    commands: Array<string>;
    skills: Array<string>;
    agents: Array<string>;
    hooks: Array<string>;
  }>;
};
