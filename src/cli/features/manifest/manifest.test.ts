/**
 * Tests for manifest persistence
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { getManifestPath } from "@/cli/features/paths.js";

import {
  createManifest,
  loadManifest,
  normalizeLegacyManifest,
  parseManifest,
  saveManifest,
} from "./manifest.js";

const selections = {
  baseSelections: ["coding-style.md", "testing.md"],
  modularSelections: { lang: ["python.md"], security: ["internal.md"] },
  hookSelections: ["ruff-format.sh"],
  agentSelections: ["python-reviewer.md"],
  skillSelections: [],
  learnedCategories: ["debugging"],
  pluginSelections: ["pyright-lsp"],
  mcpServerSelections: [],
};

describe("manifest", () => {
  let tempDir: string;
  let manifestPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "manifest-test-"));
    manifestPath = getManifestPath({ projectDir: tempDir });
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const writeRaw = async (content: string): Promise<void> => {
    await fs.mkdir(path.dirname(manifestPath), { recursive: true });
    await fs.writeFile(manifestPath, content);
  };

  describe("saveManifest and loadManifest", () => {
    it("should round-trip a manifest with private sources", async () => {
      const manifest = createManifest({
        schemaVersion: 2,
        version: "2.1.0",
        contentRoot: "/opt/content",
        selections,
        privateSources: [
          {
            sourcePath: "/src/company-config",
            prefix: "company",
            selections: {
              rules: ["lang/custom-dsp.md"],
              commands: [],
              skills: ["custom-tool"],
              agents: [],
              hooks: [],
            },
          },
        ],
      });

      const saved = await saveManifest({ projectDir: tempDir, manifest });
      const loaded = await loadManifest({ projectDir: tempDir });

      expect(loaded).toEqual(saved);
      expect(loaded?.privateSources[0].prefix).toBe("company");
    });

    it("should end the file with a newline and leave no temporary files", async () => {
      await saveManifest({
        projectDir: tempDir,
        manifest: createManifest({
          schemaVersion: 2,
          version: "2.1.0",
          contentRoot: "/opt/content",
          selections,
        }),
      });

      const content = await fs.readFile(manifestPath, "utf-8");
      expect(content.endsWith("}\n")).toBe(true);
      expect(await fs.readdir(path.dirname(manifestPath))).toEqual([
        "setup-manifest.json",
      ]);
    });

    it("should return null when no manifest exists", async () => {
      expect(await loadManifest({ projectDir: tempDir })).toBeNull();
    });

    it("should treat unparseable JSON as absent and warn", async () => {
      await writeRaw("{ not json");

      expect(await loadManifest({ projectDir: tempDir })).toBeNull();
      expect(console.log).toHaveBeenCalledTimes(1);
    });

    it("should treat a schema violation as absent", async () => {
      await writeRaw(
        JSON.stringify({
          schemaVersion: 2,
          updatedAt: "2026-01-01T00:00:00.000Z",
          baseSelections: "coding-style.md",
        }),
      );

      expect(await loadManifest({ projectDir: tempDir })).toBeNull();
    });

    it("should fill defaults and drop unknown fields", async () => {
      await writeRaw(
        JSON.stringify({
          schemaVersion: 2,
          updatedAt: "2026-01-01T00:00:00.000Z",
          baseSelections: ["testing.md"],
          extra: true,
        }),
      );

      expect(await loadManifest({ projectDir: tempDir })).toEqual({
        schemaVersion: 2,
        version: "unknown",
        contentRoot: "",
        updatedAt: "2026-01-01T00:00:00.000Z",
        baseSelections: ["testing.md"],
        modularSelections: {},
        hookSelections: [],
        agentSelections: [],
        skillSelections: [],
        learnedCategories: [],
        pluginSelections: [],
        mcpServerSelections: [],
        privateSources: [],
      });
    });
  });

  describe("legacy manifests", () => {
    const legacyDocument = {
      version: "1.4.0",
      config_repo: "/home/dev/foundry",
      repo_url: "example/foundry",
      base_rules: ["coding-style.md"],
      modular_rules: { lang: ["python.md", "react.md"], domain: ["gui.md"] },
      hooks: ["ruff-format.sh"],
      agents: [],
      skills: ["gui-threading"],
      learned_categories: ["debugging"],
      plugins: ["pyright-lsp"],
      mcp_servers: ["github"],
      private_sources: [
        {
          path: "/src/company-config",
          prefix: "company",
          rules: ["lang/custom-dsp.md"],
          hooks: ["custom-lint.sh"],
        },
      ],
    };

    it("should normalise snake_case fields on load", async () => {
      await writeRaw(JSON.stringify(legacyDocument));

      const loaded = await loadManifest({ projectDir: tempDir });

      expect(loaded).toEqual({
        schemaVersion: 1,
        version: "1.4.0",
        contentRoot: "/home/dev/foundry",
        updatedAt: "1970-01-01T00:00:00.000Z",
        baseSelections: ["coding-style.md"],
        modularSelections: {
          lang: ["python.md", "react.md"],
          domain: ["gui.md"],
        },
        hookSelections: ["ruff-format.sh"],
        agentSelections: [],
        skillSelections: ["gui-threading"],
        learnedCategories: ["debugging"],
        pluginSelections: ["pyright-lsp"],
        mcpServerSelections: ["github"],
        privateSources: [
          {
            sourcePath: "/src/company-config",
            prefix: "company",
            selections: {
              rules: ["lang/custom-dsp.md"],
              commands: [],
              skills: [],
              agents: [],
              hooks: ["custom-lint.sh"],
            },
          },
        ],
      });
    });

    it("should reject documents that are neither layout", () => {
      const parsed = parseManifest({ document: { hello: "world" } });

      expect("errors" in parsed).toBe(true);
    });

    it("should copy lists instead of sharing them", () => {
      const legacy = {
        base_rules: ["coding-style.md"],
        modular_rules: { lang: ["python.md"] },
        hooks: [],
        agents: [],
        skills: [],
        learned_categories: [],
        plugins: [],
        mcp_servers: [],
        private_sources: [],
      };

      const manifest = normalizeLegacyManifest({ legacy });
      manifest.modularSelections.lang.push("go.md");

      expect(legacy.modular_rules.lang).toEqual(["python.md"]);
    });
  });
});
