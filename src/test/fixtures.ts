/**
 * Synthetic content roots for tests
 */

import * as fs from "fs/promises";
import * as path from "path";

import { loadRegistry } from "@/cli/features/registry/registry.js";

import type {
  Registry,
  RegistryDocument,
} from "@/cli/features/registry/types.js";

export const TEST_REGISTRY: RegistryDocument = {
  schemaVersion: 2,
  baseRules: ["coding-style.md", "testing.md"],
  modularRules: {
    lang: {
      "python.md": { extensions: [".py"], configFiles: ["pyproject.toml"] },
      "nodejs.md": { configFiles: ["package.json"] },
    },
    templates: {
      "react-app.md": { dependencyKeywords: ["react"] },
      "embedded-c.md": { manual: true },
      "library.md": {},
      "testing.md": {},
    },
    platform: {
      "github.md": { directories: [".github"] },
    },
    security: {
      "internal.md": {},
      "sandbox.md": {},
    },
  },
  toolingCategories: ["lang", "platform"],
  requiredCategories: ["security"],
  hookScripts: {
    "ruff-format.sh": {
      languages: ["python.md"],
      description: "Python formatting (ruff)",
      matcher: 'tool == "Edit" && tool_input.file_path matches "\\.py$"',
    },
    "prettier-format.sh": {
      languages: ["nodejs.md", "react-app.md"],
      description: "JS/TS formatting (prettier)",
      matcher:
        'tool == "Edit" && tool_input.file_path matches "\\.(ts|tsx|js|jsx)$"',
    },
  },
  skills: {
    "api-design": { selectedBy: [] },
    "ui-patterns": { selectedBy: ["react-app.md"] },
  },
  lspPlugins: {
    "python.md": { plugin: "pyright-lsp", binary: "pyright-langserver" },
    "nodejs.md": {
      plugin: "typescript-lsp",
      binary: "typescript-language-server",
    },
    "react-app.md": {
      plugin: "typescript-lsp",
      binary: "typescript-language-server",
    },
  },
  workflowPlugins: [
    { name: "code-review", description: "Automated PR feedback" },
  ],
  ruleDescriptions: {
    "coding-style.md": "Naming and formatting conventions",
    "python.md": "Python conventions",
  },
  environmentSnippets: {
    "python.md": { setup: "uv sync", test: "uv run pytest" },
    "nodejs.md": { setup: "npm install", test: "npm test" },
  },
  migrations: [
    {
      schemaVersion: 2,
      obsoleteCategories: ["domain", "style", "arch"],
      table: [
        {
          from: { category: "lang", identifier: "react.md" },
          to: { category: "templates", identifier: "react-app.md" },
        },
        { from: { category: "lang", identifier: "c.md" }, to: null },
        {
          from: { category: "domain", identifier: "embedded.md" },
          to: { category: "templates", identifier: "embedded-c.md" },
        },
        { from: { category: "domain", identifier: "gui.md" }, to: null },
        {
          from: { category: "style", identifier: "library.md" },
          to: { category: "templates", identifier: "library.md" },
        },
        {
          from: { category: "arch", identifier: "react-app.md" },
          to: { category: "templates", identifier: "react-app.md" },
        },
      ],
    },
  ],
};

export const TEST_AGENTS = [
  "code-reviewer.md",
  "python-reviewer.md",
  "typescript-reviewer.md",
];

export const TEST_COMMANDS = ["plan.md", "review.md"];

export const TEST_LEARNED = {
  debugging: ["bisect.md", "logging.md"],
  testing: ["fixtures.md"],
};

export const TEST_MCP_SERVERS = {
  mcpServers: {
    github: {
      command: "npx",
      args: ["-y", "@modelcontextprotocol/server-github"],
      env: { GITHUB_TOKEN: "test-token" },
      description: "GitHub API access",
    },
    memory: {
      command: "npx",
      args: ["-y", "@modelcontextprotocol/server-memory"],
      description: "Persistent memory",
    },
  },
};

/**
 * Content every fixture file is written with
 * @param relativePath - Path of the file inside the content root
 *
 * @returns File content
 */
export const fixtureContent = (relativePath: string): string => {
  return `content of ${relativePath}\n`;
};

const writeFixture = async (args: {
  root: string;
  relativePath: string;
  content?: string | null;
}): Promise<void> => {
  const { root, relativePath, content } = args;
  const filePath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content ?? fixtureContent(relativePath));
};

/**
 * Write a complete content root for a registry document
 * @param args - Fixture arguments
 * @param args.contentRoot - Directory to populate
 * @param args.registry - Registry document (defaults to TEST_REGISTRY)
 *
 * @returns The content root path
 */
export const createContentRoot = async (args: {
  contentRoot: string;
  registry?: RegistryDocument | null;
}): Promise<string> => {
  const { contentRoot } = args;
  const registry = args.registry ?? TEST_REGISTRY;

  await fs.mkdir(contentRoot, { recursive: true });
  await fs.writeFile(
    path.join(contentRoot, "registry.json"),
    JSON.stringify(registry, null, 2),
  );

  for (const rule of registry.baseRules) {
    await writeFixture({ root: contentRoot, relativePath: `rules/${rule}` });
  }
  for (const [category, items] of Object.entries(registry.modularRules)) {
    for (const item of Object.keys(items)) {
      await writeFixture({
        root: contentRoot,
        relativePath: `rule-library/${category}/${item}`,
      });
    }
  }
  for (const agent of TEST_AGENTS) {
    await writeFixture({ root: contentRoot, relativePath: `agents/${agent}` });
  }
  for (const command of TEST_COMMANDS) {
    await writeFixture({
      root: contentRoot,
      relativePath: `commands/${command}`,
    });
  }
  for (const skill of Object.keys(registry.skills)) {
    await writeFixture({
      root: contentRoot,
      relativePath: `skills/${skill}/SKILL.md`,
    });
    await writeFixture({
      root: contentRoot,
      relativePath: `skills/${skill}/examples/example.md`,
    });
  }
  for (const [category, files] of Object.entries(TEST_LEARNED)) {
    for (const file of files) {
      await writeFixture({
        root: contentRoot,
        relativePath: `skills/learned/${category}/${file}`,
      });
    }
  }
  for (const hook of Object.keys(registry.hookScripts)) {
    await writeFixture({
      root: contentRoot,
      relativePath: `hooks/library/${hook}`,
      content: "#!/bin/sh\nexit 0\n",
    });
  }
  await writeFixture({
    root: contentRoot,
    relativePath: "mcp-configs/mcp-servers.json",
    content: JSON.stringify(TEST_MCP_SERVERS, null, 2),
  });

  return contentRoot;
};

/**
 * Write a content root and load its registry
 * @param args - Fixture arguments
 * @param args.contentRoot - Directory to populate
 * @param args.registry - Registry document (defaults to TEST_REGISTRY)
 *
 * @returns Loaded registry
 */
export const createTestRegistry = async (args: {
  contentRoot: string;
  registry?: RegistryDocument | null;
}): Promise<Registry> => {
  await createContentRoot(args);
  return loadRegistry({ contentRoot: args.contentRoot });
};
