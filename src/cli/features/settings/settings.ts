/**
 * Generation of `.claude/settings.json`
 *
 * foundry owns two things in the file: the `enabledPlugins` entries it
 * selected and the PostToolUse hook entries that run scripts from
 * `.claude/hooks/library/`. Every other key is carried over as it is.
 */

import * as fs from "fs/promises";

import { describeError } from "@/cli/errors.js";
import { getSettingsFile } from "@/cli/features/paths.js";
import { warn } from "@/cli/logger.js";
import { writeJsonAtomic } from "@/utils/fs.js";

import type { Registry } from "@/cli/features/registry/types.js";

export const PLUGIN_MARKETPLACE = "claude-plugins-official";
export const HOOK_COMMAND_PREFIX = ".claude/hooks/library/";

export type JsonObject = { [key: string]: unknown };

export type HookCommand = {
  type: "command";
  command: string;
};

export type PostToolUseEntry = {
  matcher: string;
  hooks: Array<HookCommand>;
  description: string;
};

/**
 * Settings contributed by foundry
 */
export type GeneratedSettings = {
  enabledPlugins?: Record<string, boolean>;
  hooks?: { PostToolUse: Array<PostToolUseEntry> };
};

export const isJsonObject = (value: unknown): value is JsonObject => {
  return typeof value === "object" && value != null && !Array.isArray(value);
};

export const getPluginKey = (plugin: string): string => {
  return `${plugin}@${PLUGIN_MARKETPLACE}`;
};

/**
 * Build the foundry part of settings.json
 * @param args - Generation arguments
 * @param args.registry - Content registry (hook matchers and descriptions)
 * @param args.hooks - Selected hook scripts
 * @param args.plugins - Selected plugins
 *
 * @returns Generated settings; empty sections are left out
 */
export const generateSettings = (args: {
  registry: Registry;
  hooks: ReadonlyArray<string>;
  plugins: ReadonlyArray<string>;
}): GeneratedSettings => {
  const { registry, hooks, plugins } = args;
  const settings: GeneratedSettings = {};

  if (plugins.length > 0) {
    settings.enabledPlugins = Object.fromEntries(
      plugins.map((plugin) => [getPluginKey(plugin), true]),
    );
  }

  const postToolUse: Array<PostToolUseEntry> = [];
  for (const script of hooks) {
    const hook = registry.hookScripts[script];
    if (hook == null) {
      continue;
    }
    postToolUse.push({
      matcher: hook.matcher,
      hooks: [{ type: "command", command: `${HOOK_COMMAND_PREFIX}${script}` }],
      description: hook.description,
    });
  }
  if (postToolUse.length > 0) {
    settings.hooks = { PostToolUse: postToolUse };
  }

  return settings;
};

/**
 * Check whether a PostToolUse entry runs a deployed hook script
 * @param entry - Entry from settings.json
 *
 * @returns True when one of its commands points into the hook library
 */
export const isGeneratedHookEntry = (entry: unknown): boolean => {
  if (!isJsonObject(entry) || !Array.isArray(entry.hooks)) {
    return false;
  }
  return entry.hooks.some(
    (hook) =>
      isJsonObject(hook) &&
      typeof hook.command === "string" &&
      hook.command.startsWith(HOOK_COMMAND_PREFIX),
  );
};

/**
 * Merge generated settings into an existing document
 * @param args - Merge arguments
 * @param args.existing - Current settings.json content
 * @param args.generated - Settings from generateSettings
 * @param args.previousPlugins - Plugins selected by the previous run (their entries are replaced)
 *
 * @returns New settings document
 */
export const mergeSettings = (args: {
  existing: JsonObject;
  generated: GeneratedSettings;
  previousPlugins?: ReadonlyArray<string> | null;
}): JsonObject => {
  const { existing, generated } = args;
  const result: JsonObject = { ...existing };

  const plugins: JsonObject = isJsonObject(existing.enabledPlugins)
    ? { ...existing.enabledPlugins }
    : {};
  for (const plugin of args.previousPlugins ?? []) {
    delete plugins[getPluginKey(plugin)];
  }
  Object.assign(plugins, generated.enabledPlugins ?? {});
  if (Object.keys(plugins).length > 0) {
    result.enabledPlugins = plugins;
  } else {
    delete result.enabledPlugins;
  }

  const hooks: JsonObject = isJsonObject(existing.hooks)
    ? { ...existing.hooks }
    : {};
  const postToolUse: Array<unknown> = Array.isArray(hooks.PostToolUse)
    ? hooks.PostToolUse.filter((entry) => !isGeneratedHookEntry(entry))
    : [];
  postToolUse.push(...(generated.hooks?.PostToolUse ?? []));
  if (postToolUse.length > 0) {
    hooks.PostToolUse = postToolUse;
  } else {
    delete hooks.PostToolUse;
  }
  if (Object.keys(hooks).length > 0) {
    result.hooks = hooks;
  } else {
    delete result.hooks;
  }

  return result;
};

/**
 * Read a JSON object document
 *
 * A missing file reads as an empty object. A file that does not hold a JSON
 * object is reported and also reads as empty.
 *
 * @param filePath - Document path
 *
 * @returns Parsed object
 */
export const readJsonObject = async (filePath: string): Promise<JsonObject> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (isJsonObject(parsed)) {
      return parsed;
    }
    warn({ message: `Ignoring ${filePath}: not a JSON object` });
  } catch (err) {
    warn({ message: `Ignoring unparseable ${filePath}: ${describeError(err)}` });
  }
  return {};
};

/**
 * Write settings.json, keeping everything foundry does not own
 * @param args - Write arguments
 * @param args.projectDir - Project root
 * @param args.generated - Settings from generateSettings
 * @param args.previousPlugins - Plugins selected by the previous run
 *
 * @returns The written document
 */
export const writeSettings = async (args: {
  projectDir: string;
  generated: GeneratedSettings;
  previousPlugins?: ReadonlyArray<string> | null;
}): Promise<JsonObject> => {
  const { projectDir, generated, previousPlugins } = args;
  const filePath = getSettingsFile({ projectDir });

  const merged = mergeSettings({
    existing: await readJsonObject(filePath),
    generated,
    previousPlugins,
  });
  await writeJsonAtomic({ filePath, data: merged });
  return merged;
};
