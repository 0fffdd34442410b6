import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeAll, afterAll } from "vitest";

import { createManifest } from "@/cli/features/manifest/manifest.js";
import { createTestRegistry, TEST_AGENTS } from "@/test/fixtures.js";

import type { Registry } from "@/cli/features/registry/types.js";

import { createNonInteractiveResolver } from "./resolvers.js";
import {
  defaultAgents,
  listPluginOptions,
  resolveSelections,
} from "./selection.js";
import type { SelectionContext } from "./selection.js";
import type {
  SelectionPrompt,
  SelectionResolver,
  SelectionResult,
} from "./types.js";

type ScriptStep = (prompt: SelectionPrompt) => SelectionResult;

/**
 * Resolver that answers from a script, then accepts defaults
 */
const scriptedResolver = (
  script: Array<ScriptStep>,
): { resolver: SelectionResolver; seen: Array<SelectionPrompt> } => {
  const seen: Array<SelectionPrompt> = [];
  const remaining = [...script];
  return {
    seen,
    resolver: {
      ...createNonInteractiveResolver(),
      interactive: true,
      resolve: async ({ prompt }) => {
        seen.push(prompt);
        const next = remaining.shift();
        return next == null
          ? { type: "accepted", selected: [...prompt.defaults] }
          : next(prompt);
      },
    },
  };
};

const accept =
  (...selected: Array<string>): ScriptStep =>
  () => ({ type: "accepted", selected });
const acceptDefaults: ScriptStep = (prompt) => ({
  type: "accepted",
  selected: [...prompt.defaults],
});

describe("selection", () => {
  let tempDir: string;
  let registry: Registry;
  let context: SelectionContext;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "selection-test-"));
    registry = await createTestRegistry({
      contentRoot: path.join(tempDir, "content"),
    });
    context = {
      registry,
      manifest: null,
      detected: { lang: ["python.md"], platform: ["github.md"] },
      agentFiles: TEST_AGENTS,
      learnedCategories: ["debugging", "testing"],
      mcpServers: [
        { name: "github", description: "GitHub API access" },
        { name: "memory", description: "Persistent memory" },
      ],
    };
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("resolveSelections", () => {
    it("should derive defaults from detection without a manifest", async () => {
      const outcome = await resolveSelections({
        context,
        resolver: createNonInteractiveResolver(),
      });

      expect(outcome).toEqual({
        type: "resolved",
        selections: {
          baseSelections: ["coding-style.md", "testing.md"],
          modularSelections: { lang: ["python.md"], platform: ["github.md"] },
          hookSelections: ["ruff-format.sh"],
          agentSelections: ["python-reviewer.md"],
          skillSelections: [],
          learnedCategories: ["debugging", "testing"],
          pluginSelections: ["pyright-lsp", "code-review"],
          mcpServerSelections: [],
        },
      });
    });

    it("should take defaults from the manifest and drop unknown values", async () => {
      const manifest = createManifest({
        schemaVersion: 2,
        version: "2.0.0",
        contentRoot: registry.contentRoot,
        selections: {
          baseSelections: ["testing.md", "retired.md"],
          modularSelections: {
            templates: ["react-app.md"],
            security: ["internal.md"],
          },
          hookSelections: ["prettier-format.sh", "gone.sh"],
          agentSelections: ["code-reviewer.md"],
          skillSelections: ["ui-patterns"],
          learnedCategories: ["testing"],
          pluginSelections: ["typescript-lsp"],
          mcpServerSelections: ["memory"],
        },
      });

      const outcome = await resolveSelections({
        context: { ...context, manifest },
        resolver: createNonInteractiveResolver(),
      });

      expect(outcome).toEqual({
        type: "resolved",
        selections: {
          baseSelections: ["testing.md"],
          modularSelections: {
            templates: ["react-app.md"],
            security: ["internal.md"],
          },
          hookSelections: ["prettier-format.sh"],
          agentSelections: ["code-reviewer.md"],
          skillSelections: ["ui-patterns"],
          learnedCategories: ["testing"],
          pluginSelections: ["typescript-lsp"],
          mcpServerSelections: ["memory"],
        },
      });
    });

    it("should go back to the previous step and recompute later defaults", async () => {
      const { resolver, seen } = scriptedResolver([
        acceptDefaults,
        accept("nodejs.md"),
        () => ({ type: "back" }),
        accept("python.md"),
      ]);

      const outcome = await resolveSelections({
        context: { ...context, detected: {} },
        resolver,
      });

      expect(seen.slice(0, 5).map((prompt) => prompt.key)).toEqual([
        "base",
        "modular:lang",
        "modular:templates",
        "modular:lang",
        "modular:templates",
      ]);
      expect(seen[3].defaults).toEqual(["nodejs.md"]);
      expect(outcome.type === "resolved" && outcome.selections).toMatchObject({
        modularSelections: { lang: ["python.md"] },
        hookSelections: ["ruff-format.sh"],
      });
    });

    it("should re-show the first step when going back from it", async () => {
      const { resolver, seen } = scriptedResolver([
        () => ({ type: "back" }),
        acceptDefaults,
      ]);

      await resolveSelections({ context, resolver });

      expect(seen.slice(0, 3).map((prompt) => prompt.key)).toEqual([
        "base",
        "base",
        "modular:lang",
      ]);
    });

    it("should stop on quit", async () => {
      const { resolver, seen } = scriptedResolver([
        acceptDefaults,
        () => ({ type: "quit" }),
      ]);

      expect(await resolveSelections({ context, resolver })).toEqual({
        type: "quit",
      });
      expect(seen).toHaveLength(2);
    });

    it("should store answers in option order and ignore unknown values", async () => {
      const { resolver } = scriptedResolver([
        accept("testing.md", "unknown.md", "coding-style.md"),
      ]);

      const outcome = await resolveSelections({ context, resolver });

      expect(
        outcome.type === "resolved" && outcome.selections.baseSelections,
      ).toEqual(["coding-style.md", "testing.md"]);
    });

    it("should mark required categories and skip empty steps", async () => {
      const { resolver, seen } = scriptedResolver([]);

      await resolveSelections({
        context: { ...context, learnedCategories: [], mcpServers: [] },
        resolver,
      });

      const security = seen.find((prompt) => prompt.key === "modular:security");
      expect(security?.required).toBe(true);
      expect(security?.title).toBe("Rules: security/ (select at least one)");
      expect(seen.map((prompt) => prompt.key)).not.toContain("learned");
      expect(seen.map((prompt) => prompt.key)).not.toContain("mcp");
    });
  });

  describe("listPluginOptions", () => {
    it("should list each LSP plugin once before workflow plugins", () => {
      expect(
        listPluginOptions({
          registry,
          selectedItems: new Set(["react-app.md", "nodejs.md", "python.md"]),
        }),
      ).toEqual([
        { value: "pyright-lsp", description: "LSP: pyright-langserver" },
        {
          value: "typescript-lsp",
          description: "LSP: typescript-language-server",
        },
        { value: "code-review", description: "Automated PR feedback" },
      ]);
    });
  });

  describe("defaultAgents", () => {
    it("should match agents by item key", () => {
      expect(
        defaultAgents({
          agentFiles: TEST_AGENTS,
          selectedItems: new Set(["python.md"]),
        }),
      ).toEqual(["python-reviewer.md"]);
    });

    it("should add TypeScript agents for web items", () => {
      expect(
        defaultAgents({
          agentFiles: TEST_AGENTS,
          selectedItems: new Set(["react-app.md"]),
        }),
      ).toEqual(["typescript-reviewer.md"]);
    });
  });
});
