/**
 * Content registry loader
 *
 * Reads `registry.json` from the content root, validates it, and returns a
 * deep-frozen Registry. Also discovers the content that is listed by directory
 * rather than by the registry (agents, commands, learned skill categories).
 */

import * as fs from "fs/promises";
import type { Dirent } from "fs";
import * as path from "path";

import { SchemaError, describeError } from "@/cli/errors.js";
import { DEPLOY_CATEGORIES } from "@/cli/features/paths.js";
import { ajv, formatSchemaErrors } from "@/cli/schema.js";

import type { Registry, RegistryDocument } from "./types.js";

const stringList = { type: "array", items: { type: "string" }, default: [] };

const migrationTargetSchema = {
  type: "object",
  properties: {
    category: { type: "string" },
    identifier: { type: "string" },
  },
  required: ["category", "identifier"],
  additionalProperties: false,
};

const registrySchema = {
  type: "object",
  properties: {
    schemaVersion: { type: "integer", minimum: 1 },
    baseRules: stringList,
    modularRules: {
      type: "object",
      additionalProperties: {
        type: "object",
        additionalProperties: {
          type: "object",
          properties: {
            extensions: { type: "array", items: { type: "string" } },
            configFiles: { type: "array", items: { type: "string" } },
            dependencyKeywords: { type: "array", items: { type: "string" } },
            directories: { type: "array", items: { type: "string" } },
            manual: { type: "boolean" },
          },
          additionalProperties: false,
        },
      },
      default: {},
    },
    toolingCategories: stringList,
    requiredCategories: stringList,
    hookScripts: {
      type: "object",
      additionalProperties: {
        type: "object",
        properties: {
          languages: stringList,
          description: { type: "string" },
          matcher: { type: "string", default: "" },
        },
        required: ["description"],
        additionalProperties: false,
      },
      default: {},
    },
    skills: {
      type: "object",
      additionalProperties: {
        type: "object",
        properties: { selectedBy: stringList },
        additionalProperties: false,
      },
      default: {},
    },
    lspPlugins: {
      type: "object",
      additionalProperties: {
        type: "object",
        properties: {
          plugin: { type: "string" },
          binary: { type: "string" },
        },
        required: ["plugin", "binary"],
        additionalProperties: false,
      },
      default: {},
    },
    workflowPlugins: {
      type: "array",
      items: {
        type: "object",
        properties: {
          name: { type: "string" },
          description: { type: "string" },
        },
        required: ["name", "description"],
        additionalProperties: false,
      },
      default: [],
    },
    ruleDescriptions: {
      type: "object",
      additionalProperties: { type: "string" },
      default: {},
    },
    environmentSnippets: {
      type: "object",
      additionalProperties: {
        type: "object",
        additionalProperties: { type: "string" },
      },
      default: {},
    },
    migrations: {
      type: "array",
      items: {
        type: "object",
        properties: {
          schemaVersion: { type: "integer", minimum: 1 },
          obsoleteCategories: stringList,
          table: {
            type: "array",
            items: {
              type: "object",
              properties: {
                from: migrationTargetSchema,
                to: {
                  anyOf: [migrationTargetSchema, { type: "null" }],
                },
              },
              required: ["from", "to"],
              additionalProperties: false,
            },
            default: [],
          },
        },
        required: ["schemaVersion"],
        additionalProperties: false,
      },
      default: [],
    },
  },
  required: ["schemaVersion", "baseRules"],
  additionalProperties: false,
};

const validateRegistry = ajv.compile<RegistryDocument>(registrySchema);

const deepFreeze = <T>(value: T): T => {
  if (value != null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
};

export const getRegistryPath = (args: { contentRoot: string }): string => {
  return path.join(args.contentRoot, "registry.json");
};

/**
 * Load and validate the content registry
 * @param args - Load arguments
 * @param args.contentRoot - Directory holding registry.json and the content files
 *
 * @throws SchemaError when registry.json is missing, unparseable or invalid
 *
 * @returns Deep-frozen registry
 */
export const loadRegistry = async (args: {
  contentRoot: string;
}): Promise<Registry> => {
  const { contentRoot } = args;
  const registryPath = getRegistryPath({ contentRoot });

  let parsed: unknown;
  try {
    const content = await fs.readFile(registryPath, "utf-8");
    parsed = JSON.parse(content);
  } catch (err) {
    throw new SchemaError({
      filePath: registryPath,
      message: `Unable to read content registry at ${registryPath}: ${describeError(err)}`,
    });
  }

  if (!validateRegistry(parsed)) {
    throw new SchemaError({
      filePath: registryPath,
      message: `Invalid content registry at ${registryPath}`,
      details: formatSchemaErrors(validateRegistry.errors),
    });
  }

  return deepFreeze({ ...parsed, contentRoot: path.resolve(contentRoot) });
};

export const getModularCategories = (args: {
  registry: Registry;
}): Array<string> => {
  return Object.keys(args.registry.modularRules);
};

/**
 * Collect the modular items that belong to tooling categories
 * @param args - Lookup arguments
 * @param args.registry - Content registry
 *
 * @returns Item identifiers from every tooling category
 */
export const getToolingItems = (args: { registry: Registry }): Set<string> => {
  const { registry } = args;
  const items = new Set<string>();
  for (const category of registry.toolingCategories) {
    for (const item of Object.keys(registry.modularRules[category] ?? {})) {
      items.add(item);
    }
  }
  return items;
};

/**
 * Collect the entry names registry content can take in the project
 *
 * Covers base rules, modular rules under both their plain and their
 * `<category>-<item>` collision names, hook scripts, skills, and the agents
 * and commands shipped in the content root.
 *
 * @param args - Lookup arguments
 * @param args.registry - Content registry
 *
 * @returns Entry names
 */
export const getRegistryEntryNames = async (args: {
  registry: Registry;
}): Promise<Set<string>> => {
  const { registry } = args;
  const names = new Set<string>(registry.baseRules);

  for (const [category, items] of Object.entries(registry.modularRules)) {
    for (const item of Object.keys(items)) {
      names.add(item);
      names.add(`${category}-${item}`);
    }
  }
  for (const hook of Object.keys(registry.hookScripts)) {
    names.add(hook);
  }
  for (const skill of Object.keys(registry.skills)) {
    names.add(skill);
  }
  for (const file of [
    ...(await listAgentFiles(args)),
    ...(await listCommandFiles(args)),
  ]) {
    names.add(file);
  }

  return names;
};

/**
 * Names a private source prefix may never take
 * @param args - Lookup arguments
 * @param args.registry - Content registry
 *
 * @returns Category names, the learned skill directories and modular category keys
 */
export const getReservedPrefixes = (args: {
  registry: Registry;
}): Set<string> => {
  return new Set<string>([
    ...DEPLOY_CATEGORIES,
    "learned",
    "learned-local",
    ...getModularCategories(args),
  ]);
};

const listEntries = async (args: {
  dir: string;
  kind: "file" | "directory";
  extension?: string | null;
}): Promise<Array<string>> => {
  const { dir, kind, extension } = args;
  let entries: Array<Dirent>;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }

  return entries
    .filter((entry) =>
      kind === "file" ? entry.isFile() : entry.isDirectory(),
    )
    .map((entry) => entry.name)
    .filter((name) => !name.startsWith("."))
    .filter((name) => extension == null || name.endsWith(extension))
    .sort();
};

/**
 * List the agent definitions shipped in the content root
 * @param args - Lookup arguments
 * @param args.registry - Content registry
 *
 * @returns Sorted agent file names (e.g. "python-reviewer.md")
 */
export const listAgentFiles = async (args: {
  registry: Registry;
}): Promise<Array<string>> => {
  return listEntries({
    dir: path.join(args.registry.contentRoot, "agents"),
    kind: "file",
    extension: ".md",
  });
};

export const listCommandFiles = async (args: {
  registry: Registry;
}): Promise<Array<string>> => {
  return listEntries({
    dir: path.join(args.registry.contentRoot, "commands"),
    kind: "file",
    extension: ".md",
  });
};

export const listLearnedCategories = async (args: {
  registry: Registry;
}): Promise<Array<string>> => {
  return listEntries({
    dir: path.join(args.registry.contentRoot, "skills", "learned"),
    kind: "directory",
  });
};

/**
 * Resolve content source paths inside the content root
 */
export const contentPaths = {
  baseRule: (args: { registry: Registry; name: string }): string =>
    path.join(args.registry.contentRoot, "rules", args.name),
  modularRule: (args: {
    registry: Registry;
    category: string;
    name: string;
  }): string =>
    path.join(
      args.registry.contentRoot,
      "rule-library",
      args.category,
      args.name,
    ),
  agent: (args: { registry: Registry; name: string }): string =>
    path.join(args.registry.contentRoot, "agents", args.name),
  command: (args: { registry: Registry; name: string }): string =>
    path.join(args.registry.contentRoot, "commands", args.name),
  skill: (args: { registry: Registry; name: string }): string =>
    path.join(args.registry.contentRoot, "skills", args.name),
  learnedCategory: (args: { registry: Registry; name: string }): string =>
    path.join(args.registry.contentRoot, "skills", "learned", args.name),
  hook: (args: { registry: Registry; name: string }): string =>
    path.join(args.registry.contentRoot, "hooks", "library", args.name),
  mcpCatalog: (args: { registry: Registry }): string =>
    path.join(args.registry.contentRoot, "mcp-configs", "mcp-servers.json"),
};
