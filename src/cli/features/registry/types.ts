/**
 * Types for the content registry
 *
 * The registry is the static catalog shipped alongside the content files. It
 * is loaded once per command, frozen, and passed explicitly to every component
 * that needs it.
 */

/**
 * How a modular rule is proposed by project detection
 */
export type DetectionMetadata = {
  /** File extensions that indicate the item (e.g. ".py") */
  readonly extensions?: ReadonlyArray<string>;
  /** Files at the project root that indicate the item (e.g. "Cargo.toml") */
  readonly configFiles?: ReadonlyArray<string>;
  /** Case-insensitive keywords looked up in dependency manifests */
  readonly dependencyKeywords?: ReadonlyArray<string>;
  /** Directories at the project root that indicate the item (e.g. ".github") */
  readonly directories?: ReadonlyArray<string>;
  /** Never auto-selected */
  readonly manual?: boolean;
};

export type HookScript = {
  /** Modular rule items that auto-select this hook */
  readonly languages: ReadonlyArray<string>;
  readonly description: string;
  /** PostToolUse matcher expression written to settings.json */
  readonly matcher: string;
};

export type SkillEntry = {
  /** Modular rule items that auto-select this skill */
  readonly selectedBy: ReadonlyArray<string>;
};

export type LspPlugin = {
  readonly plugin: string;
  readonly binary: string;
};

export type WorkflowPlugin = {
  readonly name: string;
  readonly description: string;
};

export type MigrationTarget = {
  readonly category: string;
  readonly identifier: string;
};

export type MigrationEntry = {
  readonly from: MigrationTarget;
  /** null drops the item without replacement */
  readonly to: MigrationTarget | null;
};

/**
 * One registry reorganization
 */
export type MigrationRevision = {
  /** Schema version introduced by this revision */
  readonly schemaVersion: number;
  /** Modular categories that no longer exist after this revision */
  readonly obsoleteCategories: ReadonlyArray<string>;
  readonly table: ReadonlyArray<MigrationEntry>;
};

export type Registry = {
  /** Directory the content files are resolved against */
  readonly contentRoot: string;
  readonly schemaVersion: number;
  readonly baseRules: ReadonlyArray<string>;
  /** category -> item -> detection metadata, in menu order */
  readonly modularRules: Readonly<
    Record<string, Readonly<Record<string, DetectionMetadata>>>
  >;
  /** Modular categories whose items count as tooling (listed first in CLAUDE.md) */
  readonly toolingCategories: ReadonlyArray<string>;
  /** Modular categories that need at least one interactive selection */
  readonly requiredCategories: ReadonlyArray<string>;
  readonly hookScripts: Readonly<Record<string, HookScript>>;
  readonly skills: Readonly<Record<string, SkillEntry>>;
  /** modular item -> LSP plugin */
  readonly lspPlugins: Readonly<Record<string, LspPlugin>>;
  readonly workflowPlugins: ReadonlyArray<WorkflowPlugin>;
  readonly ruleDescriptions: Readonly<Record<string, string>>;
  /** modular item -> snippet name ("setup", "test", ...) -> command */
  readonly environmentSnippets: Readonly<
    Record<string, Readonly<Record<string, string>>>
  >;
  readonly migrations: ReadonlyArray<MigrationRevision>;
};

/**
 * Shape of registry.json on disk
 */
export type RegistryDocument = Omit<Registry, "contentRoot">;
