/**
 * Namespace ownership of entries in the destination tree
 *
 * Every name found in a category directory falls into exactly one class:
 * protected (never deleted by any pass), owned by a registered private prefix,
 * or managed by the registry.
 */

import type { DeployCategory } from "@/cli/features/paths.js";

export type Ownership =
  | { type: "protected" }
  | { type: "private-owned"; prefix: string }
  | { type: "managed-unowned" };

/**
 * Who a reconciliation pass runs on behalf of
 */
export type PassOwner = { type: "registry" } | { type: "private"; prefix: string };

export type OwnershipPolicy = {
  /** Registered prefixes, longest first */
  readonly privatePrefixes: ReadonlyArray<string>;
  readonly protectedNames: Readonly<
    Partial<Record<DeployCategory, ReadonlyArray<string>>>
  >;
};

export const DEFAULT_PROTECTED_NAMES: OwnershipPolicy["protectedNames"] = {
  skills: ["learned", "learned-local"],
};

/**
 * Build an ownership policy from the registered private prefixes
 * @param args - Policy arguments
 * @param args.privatePrefixes - Prefixes of every registered private source
 *
 * @returns Ownership policy
 */
export const createOwnershipPolicy = (args: {
  privatePrefixes: Iterable<string>;
}): OwnershipPolicy => {
  const prefixes = [...new Set(args.privatePrefixes)].sort(
    (a, b) => b.length - a.length || a.localeCompare(b),
  );
  return {
    privatePrefixes: prefixes,
    protectedNames: DEFAULT_PROTECTED_NAMES,
  };
};

/**
 * Classify an existing entry of a category directory
 *
 * When registered prefixes overlap (`acme` and `acme-tools`), the longest one
 * that matches owns the entry.
 *
 * @param args - Classification arguments
 * @param args.category - Category the entry lives in
 * @param args.name - Entry name inside the category directory
 * @param args.policy - Ownership policy
 *
 * @returns Ownership class of the entry
 */
export const classifyEntry = (args: {
  category: DeployCategory;
  name: string;
  policy: OwnershipPolicy;
}): Ownership => {
  const { category, name, policy } = args;

  if (policy.protectedNames[category]?.includes(name)) {
    return { type: "protected" };
  }

  for (const prefix of policy.privatePrefixes) {
    if (name.startsWith(`${prefix}-`)) {
      return { type: "private-owned", prefix };
    }
  }

  return { type: "managed-unowned" };
};

/**
 * Check whether a pass may delete an entry of the given ownership
 * @param args - Check arguments
 * @param args.ownership - Classification of the entry
 * @param args.owner - Owner of the running pass
 *
 * @returns True only when the entry belongs to the pass
 */
export const isOwnedBy = (args: {
  ownership: Ownership;
  owner: PassOwner;
}): boolean => {
  const { ownership, owner } = args;
  if (owner.type === "registry") {
    return ownership.type === "managed-unowned";
  }
  return ownership.type === "private-owned" && ownership.prefix === owner.prefix;
};
