/**
 * MCP server catalog and the project's `.claude.json`
 */

import * as fs from "fs/promises";

import { SchemaError, describeError } from "@/cli/errors.js";
import { getMcpFile } from "@/cli/features/paths.js";
import { contentPaths } from "@/cli/features/registry/registry.js";
import { ajv, formatSchemaErrors } from "@/cli/schema.js";
import { writeJsonAtomic } from "@/utils/fs.js";

import type { Registry } from "@/cli/features/registry/types.js";

import { isJsonObject, readJsonObject } from "./settings.js";
import type { JsonObject } from "./settings.js";

/**
 * One server of the catalog, as shipped
 */
export type McpServerDefinition = JsonObject & {
  description?: string;
};

type McpCatalogDocument = {
  mcpServers: Record<string, McpServerDefinition>;
};

const catalogSchema = {
  type: "object",
  properties: {
    mcpServers: {
      type: "object",
      additionalProperties: {
        type: "object",
        properties: { description: { type: "string" } },
      },
    },
  },
  required: ["mcpServers"],
};

const validateCatalog = ajv.compile<McpCatalogDocument>(catalogSchema);

/**
 * Load the MCP server catalog of the content root
 * @param args - Load arguments
 * @param args.registry - Content registry
 *
 * @throws SchemaError when the catalog exists but is not valid
 *
 * @returns Servers by name in catalog order; empty when there is no catalog
 */
export const loadMcpCatalog = async (args: {
  registry: Registry;
}): Promise<Record<string, McpServerDefinition>> => {
  const filePath = contentPaths.mcpCatalog({ registry: args.registry });

  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new SchemaError({
      filePath,
      message: `Unable to parse MCP server catalog at ${filePath}: ${describeError(err)}`,
    });
  }
  if (!validateCatalog(parsed)) {
    throw new SchemaError({
      filePath,
      message: `Invalid MCP server catalog at ${filePath}`,
      details: formatSchemaErrors(validateCatalog.errors),
    });
  }
  return parsed.mcpServers;
};

/**
 * Merge selected servers into `<project>/.claude.json`
 *
 * Descriptions are catalog-only and are not written. Servers already in the
 * file under other names are kept; a selected server replaces its namesake.
 *
 * @param args - Write arguments
 * @param args.projectDir - Project root
 * @param args.catalog - Server catalog
 * @param args.servers - Selected server names
 *
 * @returns Names written, in selection order; nothing is written when empty
 */
export const writeMcpServers = async (args: {
  projectDir: string;
  catalog: Record<string, McpServerDefinition>;
  servers: ReadonlyArray<string>;
}): Promise<Array<string>> => {
  const { projectDir, catalog, servers } = args;

  const selected: JsonObject = {};
  for (const name of servers) {
    const definition = catalog[name];
    if (definition == null) {
      continue;
    }
    const { description: _description, ...config } = definition;
    selected[name] = config;
  }
  const written = Object.keys(selected);
  if (written.length === 0) {
    return [];
  }

  const filePath = getMcpFile({ projectDir });
  const document = await readJsonObject(filePath);
  document.mcpServers = {
    ...(isJsonObject(document.mcpServers) ? document.mcpServers : {}),
    ...selected,
  };
  await writeJsonAtomic({ filePath, data: document });
  return written;
};
