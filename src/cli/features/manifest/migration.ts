/**
 * Manifest migration across registry reorganizations
 *
 * Each registry revision ships a table mapping old (category, item) pairs to
 * their new home, or to nothing. Migration rewrites the modular selections of
 * a manifest through every revision it has not seen yet.
 */

import type { Manifest } from "./types.js";
import type {
  MigrationRevision,
  MigrationTarget,
  Registry,
} from "@/cli/features/registry/types.js";

type ModularSelections = Record<string, Array<string>>;

const pairKey = (category: string, identifier: string): string => {
  return `${category}\u0000${identifier}`;
};

const applyRevision = (args: {
  selections: Readonly<Record<string, ReadonlyArray<string>>>;
  revision: MigrationRevision;
}): ModularSelections => {
  const { selections, revision } = args;

  const lookup = new Map<string, MigrationTarget | null>(
    revision.table.map((entry) => [
      pairKey(entry.from.category, entry.from.identifier),
      entry.to,
    ]),
  );

  const result: ModularSelections = {};
  for (const category of Object.keys(selections)) {
    result[category] = [];
  }

  const add = (category: string, identifier: string): void => {
    const items = result[category] ?? [];
    if (!items.includes(identifier)) {
      items.push(identifier);
    }
    result[category] = items;
  };

  const migratedFrom = new Set<string>();

  for (const [category, items] of Object.entries(selections)) {
    for (const identifier of items) {
      const key = pairKey(category, identifier);
      if (!lookup.has(key)) {
        add(category, identifier);
        continue;
      }

      migratedFrom.add(category);
      const target = lookup.get(key);
      if (target != null) {
        add(target.category, target.identifier);
      }
    }
  }

  for (const category of revision.obsoleteCategories) {
    delete result[category];
  }
  for (const category of migratedFrom) {
    if (result[category]?.length === 0) {
      delete result[category];
    }
  }

  return result;
};

/**
 * Rewrite modular selections through a list of registry revisions
 *
 * Items with a table entry move to their target category (set-union) or are
 * dropped; items without one stay where they are. Obsolete category keys are
 * always removed, and categories emptied by the move disappear. The input is
 * never mutated.
 *
 * @param args - Migration arguments
 * @param args.selections - Modular selections (category -> items)
 * @param args.migrations - Revisions to apply, in order
 *
 * @returns Migrated selections
 */
export const migrateModularSelections = (args: {
  selections: Readonly<Record<string, ReadonlyArray<string>>>;
  migrations: ReadonlyArray<MigrationRevision>;
}): ModularSelections => {
  const { selections, migrations } = args;

  let current: ModularSelections = Object.fromEntries(
    Object.entries(selections).map(([category, items]) => [
      category,
      [...items],
    ]),
  );
  for (const revision of migrations) {
    current = applyRevision({ selections: current, revision });
  }
  return current;
};

/**
 * Bring a manifest up to the registry's schema version
 * @param args - Migration arguments
 * @param args.manifest - Loaded manifest
 * @param args.registry - Current content registry
 *
 * @returns New manifest with migrated selections and the current schemaVersion
 */
export const migrateManifest = (args: {
  manifest: Manifest;
  registry: Registry;
}): Manifest => {
  const { manifest, registry } = args;

  const pending = registry.migrations.filter(
    (revision) => revision.schemaVersion > manifest.schemaVersion,
  );

  return {
    ...manifest,
    schemaVersion: Math.max(manifest.schemaVersion, registry.schemaVersion),
    modularSelections: migrateModularSelections({
      selections: manifest.modularSelections,
      migrations: pending,
    }),
  };
};

/**
 * Check whether a manifest predates the registry's schema
 * @param args - Check arguments
 * @param args.manifest - Loaded manifest
 * @param args.registry - Current content registry
 *
 * @returns True when migration would change the manifest's schema version
 */
export const needsMigration = (args: {
  manifest: Manifest;
  registry: Registry;
}): boolean => {
  return args.manifest.schemaVersion < args.registry.schemaVersion;
};
