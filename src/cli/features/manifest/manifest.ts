/**
 * Setup manifest persistence
 *
 * The manifest lives at `.claude/setup-manifest.json`. It is validated on
 * load; a manifest that cannot be read or does not match its schema is
 * reported and treated as absent, so the run falls back to fresh defaults.
 */

import * as fs from "fs/promises";

import { describeError } from "@/cli/errors.js";
import { getManifestPath } from "@/cli/features/paths.js";
import { warn } from "@/cli/logger.js";
import { ajv, formatSchemaErrors } from "@/cli/schema.js";
import { writeJsonAtomic } from "@/utils/fs.js";

import type {
  LegacyManifest,
  Manifest,
  PrivateSourceRef,
} from "./types.js";

/**
 * Selections as recorded in the manifest
 */
export type ProjectSelections = Pick<
  Manifest,
  | "baseSelections"
  | "modularSelections"
  | "hookSelections"
  | "agentSelections"
  | "skillSelections"
  | "learnedCategories"
  | "pluginSelections"
  | "mcpServerSelections"
>;

const LEGACY_SCHEMA_VERSION = 1;

const stringList = { type: "array", items: { type: "string" }, default: [] };
const selectionMap = {
  type: "object",
  additionalProperties: { type: "array", items: { type: "string" } },
  default: {},
};

const privateSelectionsSchema = {
  type: "object",
  properties: {
    rules: stringList,
    commands: stringList,
    skills: stringList,
    agents: stringList,
    hooks: stringList,
  },
  default: {},
  additionalProperties: false,
};

const manifestSchema = {
  type: "object",
  properties: {
    schemaVersion: { type: "integer", minimum: 1 },
    version: { type: "string", default: "unknown" },
    contentRoot: { type: "string", default: "" },
    updatedAt: { type: "string", format: "date-time" },
    baseSelections: stringList,
    modularSelections: selectionMap,
    hookSelections: stringList,
    agentSelections: stringList,
    skillSelections: stringList,
    learnedCategories: stringList,
    pluginSelections: stringList,
    mcpServerSelections: stringList,
    privateSources: {
      type: "array",
      items: {
        type: "object",
        properties: {
          sourcePath: { type: "string" },
          prefix: { type: "string" },
          selections: privateSelectionsSchema,
        },
        required: ["sourcePath", "prefix"],
        additionalProperties: false,
      },
      default: [],
    },
  },
  required: ["schemaVersion", "updatedAt"],
  additionalProperties: false,
};

const legacyManifestSchema = {
  type: "object",
  properties: {
    version: { type: ["string", "null"] },
    config_repo: { type: ["string", "null"] },
    base_rules: stringList,
    modular_rules: selectionMap,
    hooks: stringList,
    agents: stringList,
    skills: stringList,
    learned_categories: stringList,
    plugins: stringList,
    mcp_servers: stringList,
    private_sources: {
      type: "array",
      items: {
        type: "object",
        properties: {
          path: { type: "string" },
          prefix: { type: "string" },
          rules: stringList,
          commands: stringList,
          skills: stringList,
          agents: stringList,
          hooks: stringList,
        },
        required: ["path", "prefix"],
        additionalProperties: false,
      },
      default: [],
    },
  },
  anyOf: [
    { required: ["base_rules"] },
    { required: ["modular_rules"] },
    { required: ["private_sources"] },
  ],
  additionalProperties: false,
};

const validateManifest = ajv.compile<Manifest>(manifestSchema);
const validateLegacyManifest = ajv.compile<LegacyManifest>(
  legacyManifestSchema,
);

/**
 * Convert a first-release manifest to the current layout
 * @param args - Conversion arguments
 * @param args.legacy - Validated legacy manifest
 *
 * @returns Manifest at schema version 1, ready for migration
 */
export const normalizeLegacyManifest = (args: {
  legacy: LegacyManifest;
}): Manifest => {
  const { legacy } = args;
  return {
    schemaVersion: LEGACY_SCHEMA_VERSION,
    version: legacy.version ?? "unknown",
    contentRoot: legacy.config_repo ?? "",
    updatedAt: new Date(0).toISOString(),
    baseSelections: [...legacy.base_rules],
    modularSelections: Object.fromEntries(
      Object.entries(legacy.modular_rules).map(([category, items]) => [
        category,
        [...items],
      ]),
    ),
    hookSelections: [...legacy.hooks],
    agentSelections: [...legacy.agents],
    skillSelections: [...legacy.skills],
    learnedCategories: [...legacy.learned_categories],
    pluginSelections: [...legacy.plugins],
    mcpServerSelections: [...legacy.mcp_servers],
    privateSources: legacy.private_sources.map(
      (source): PrivateSourceRef => ({
        sourcePath: source.path,
        prefix: source.prefix,
        selections: {
          rules: [...source.rules],
          commands: [...source.commands],
          skills: [...source.skills],
          agents: [...source.agents],
          hooks: [...source.hooks],
        },
      }),
    ),
  };
};

/**
 * Validate a parsed manifest document
 * @param args - Parse arguments
 * @param args.document - Parsed JSON (mutated by validation defaults)
 *
 * @returns The manifest, or the validation errors
 */
export const parseManifest = (args: {
  document: unknown;
}): { manifest: Manifest } | { errors: Array<string> } => {
  const { document } = args;

  const isCurrent =
    document != null && typeof document === "object" && "schemaVersion" in document;

  if (isCurrent) {
    if (validateManifest(document)) {
      return { manifest: document };
    }
    return { errors: formatSchemaErrors(validateManifest.errors) };
  }

  if (validateLegacyManifest(document)) {
    return { manifest: normalizeLegacyManifest({ legacy: document }) };
  }
  return { errors: formatSchemaErrors(validateLegacyManifest.errors) };
};

/**
 * Load the project's manifest
 * @param args - Load arguments
 * @param args.projectDir - Project root
 *
 * @returns The manifest if present and valid, null otherwise
 */
export const loadManifest = async (args: {
  projectDir: string;
}): Promise<Manifest | null> => {
  const { projectDir } = args;
  const manifestPath = getManifestPath({ projectDir });

  let content: string;
  try {
    content = await fs.readFile(manifestPath, "utf-8");
  } catch {
    return null;
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    warn({
      message: `Ignoring unreadable manifest ${manifestPath}: ${describeError(err)}`,
    });
    return null;
  }

  const parsed = parseManifest({ document });
  if ("errors" in parsed) {
    warn({
      message: `Ignoring invalid manifest ${manifestPath}: ${parsed.errors.join("; ")}`,
    });
    return null;
  }

  return parsed.manifest;
};

/**
 * Save the manifest, replacing the previous one
 * @param args - Save arguments
 * @param args.projectDir - Project root
 * @param args.manifest - Manifest to save
 *
 * @returns The saved manifest with a fresh updatedAt
 */
export const saveManifest = async (args: {
  projectDir: string;
  manifest: Manifest;
}): Promise<Manifest> => {
  const { projectDir, manifest } = args;
  const saved: Manifest = {
    ...manifest,
    updatedAt: new Date().toISOString(),
  };

  await writeJsonAtomic({
    filePath: getManifestPath({ projectDir }),
    data: saved,
  });
  return saved;
};

/**
 * Build a manifest for a completed run
 * @param args - Manifest arguments
 * @param args.schemaVersion - Registry schema revision
 * @param args.version - Package version
 * @param args.contentRoot - Content root used for the run
 * @param args.selections - Selections of the run
 * @param args.privateSources - Registered private sources
 *
 * @returns New manifest
 */
export const createManifest = (args: {
  schemaVersion: number;
  version: string;
  contentRoot: string;
  selections: ProjectSelections;
  privateSources?: Array<PrivateSourceRef> | null;
}): Manifest => {
  const { schemaVersion, version, contentRoot, selections, privateSources } =
    args;
  return {
    schemaVersion,
    version,
    contentRoot,
    updatedAt: new Date().toISOString(),
    ...selections,
    privateSources: privateSources ?? [],
  };
};

/**
 * Extract the selections recorded in a manifest
 * @param args - Lookup arguments
 * @param args.manifest - Manifest to read
 *
 * @returns Selections only
 */
export const getManifestSelections = (args: {
  manifest: Manifest;
}): ProjectSelections => {
  const { manifest } = args;
  return {
    baseSelections: manifest.baseSelections,
    modularSelections: manifest.modularSelections,
    hookSelections: manifest.hookSelections,
    agentSelections: manifest.agentSelections,
    skillSelections: manifest.skillSelections,
    learnedCategories: manifest.learnedCategories,
    pluginSelections: manifest.pluginSelections,
    mcpServerSelections: manifest.mcpServerSelections,
  };
};
