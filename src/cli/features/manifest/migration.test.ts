import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeAll, afterAll } from "vitest";

import { createManifest } from "@/cli/features/manifest/manifest.js";
import { createTestRegistry, TEST_REGISTRY } from "@/test/fixtures.js";

import type { Registry } from "@/cli/features/registry/types.js";

import {
  migrateManifest,
  migrateModularSelections,
  needsMigration,
} from "./migration.js";

const migrate = (
  selections: Record<string, Array<string>>,
): Record<string, Array<string>> =>
  migrateModularSelections({
    selections,
    migrations: TEST_REGISTRY.migrations,
  });

describe("migrateModularSelections", () => {
  it("should move a renamed item out of an obsolete category", () => {
    expect(migrate({ domain: ["embedded.md"] })).toEqual({
      templates: ["embedded-c.md"],
    });
  });

  it("should keep unmapped items of a surviving category", () => {
    expect(migrate({ lang: ["python.md", "react.md"] })).toEqual({
      lang: ["python.md"],
      templates: ["react-app.md"],
    });
  });

  it("should collapse items mapped to the same target", () => {
    expect(
      migrate({ lang: ["react.md"], arch: ["react-app.md"] }),
    ).toEqual({ templates: ["react-app.md"] });
  });

  it("should union mapped items with existing target selections", () => {
    expect(
      migrate({
        templates: ["react-app.md", "library.md"],
        style: ["library.md"],
      }),
    ).toEqual({ templates: ["react-app.md", "library.md"] });
  });

  it("should drop items mapped to nothing", () => {
    expect(migrate({ lang: ["c.md", "python.md"], domain: ["gui.md"] })).toEqual(
      { lang: ["python.md"] },
    );
  });

  it("should remove a category emptied by migration", () => {
    expect(migrate({ lang: ["c.md"] })).toEqual({});
  });

  it("should delete obsolete category keys even without matching items", () => {
    expect(
      migrate({ domain: ["unknown.md"], platform: ["github.md"] }),
    ).toEqual({ platform: ["github.md"] });
  });

  it("should leave categories without table entries untouched", () => {
    const input = { platform: ["github.md"], security: [] };

    expect(migrate(input)).toEqual({ platform: ["github.md"], security: [] });
  });

  it("should be idempotent", () => {
    const inputs: Array<Record<string, Array<string>>> = [
      { lang: ["python.md", "react.md", "c.md"], domain: ["embedded.md"] },
      { style: ["library.md"], arch: ["react-app.md"], platform: ["github.md"] },
      { templates: ["embedded-c.md"] },
      {},
    ];

    for (const input of inputs) {
      const once = migrate(input);
      expect(migrate(once)).toEqual(once);
    }
  });

  it("should not mutate its input", () => {
    const input = { lang: ["python.md", "react.md"], domain: ["embedded.md"] };
    const copy = JSON.parse(JSON.stringify(input));

    migrate(input);

    expect(input).toEqual(copy);
  });
});

describe("migrateManifest", () => {
  let tempDir: string;
  let registry: Registry;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "migration-test-"));
    registry = await createTestRegistry({
      contentRoot: path.join(tempDir, "content"),
    });
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const manifestAt = (
    schemaVersion: number,
    modularSelections: Record<string, Array<string>>,
  ) =>
    createManifest({
      schemaVersion,
      version: "1.0.0",
      contentRoot: "/content",
      selections: {
        baseSelections: ["coding-style.md"],
        modularSelections,
        hookSelections: ["ruff-format.sh"],
        agentSelections: [],
        skillSelections: [],
        learnedCategories: ["debugging"],
        pluginSelections: [],
        mcpServerSelections: [],
      },
    });

  it("should migrate an old manifest and stamp the current schema", () => {
    const manifest = manifestAt(1, {
      lang: ["python.md", "react.md"],
      domain: ["embedded.md"],
    });

    expect(needsMigration({ manifest, registry })).toBe(true);
    const migrated = migrateManifest({ manifest, registry });

    expect(migrated.schemaVersion).toBe(2);
    expect(migrated.modularSelections).toEqual({
      lang: ["python.md"],
      templates: ["react-app.md", "embedded-c.md"],
    });
    expect(migrated.baseSelections).toEqual(["coding-style.md"]);
    expect(migrated.hookSelections).toEqual(["ruff-format.sh"]);
    expect(manifest.modularSelections).toEqual({
      lang: ["python.md", "react.md"],
      domain: ["embedded.md"],
    });
  });

  it("should not apply revisions a manifest has already seen", () => {
    const manifest = manifestAt(2, { lang: ["c.md"] });

    expect(needsMigration({ manifest, registry })).toBe(false);
    expect(migrateManifest({ manifest, registry }).modularSelections).toEqual({
      lang: ["c.md"],
    });
  });
});
