/**
 * Generated block inside the project's CLAUDE.md
 *
 * Only the text between the start and end markers belongs to foundry. Every
 * byte outside that span is the user's and is carried over untouched.
 */

import { getToolingItems } from "@/cli/features/registry/registry.js";

import type { Registry } from "@/cli/features/registry/types.js";

export const BLOCK_START = "<!-- foundry -->";
export const BLOCK_END = "<!-- /foundry -->";

/**
 * Check whether a document carries the generated block
 * @param content - Raw document bytes
 *
 * @returns True when the exact start marker is present
 */
export const hasBlock = (content: Buffer): boolean => {
  return content.includes(BLOCK_START);
};

/**
 * Fallback description for a rule the registry does not describe
 * @param rule - Rule file name (e.g. "git-workflow.md")
 *
 * @returns Title-cased name (e.g. "Git Workflow")
 */
export const describeRuleName = (rule: string): string => {
  return rule
    .replace(/\.md$/, "")
    .split(/[-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
};

const renderRules = (args: {
  registry: Registry;
  deployedRules: ReadonlyArray<string>;
}): string => {
  const { registry, deployedRules } = args;
  const tooling = getToolingItems({ registry });
  const unique = [...new Set(deployedRules)];

  const ordered = [
    ...unique.filter((rule) => tooling.has(rule)).sort(),
    ...unique.filter((rule) => !tooling.has(rule)).sort(),
  ];
  if (ordered.length === 0) {
    return "- (none deployed)";
  }

  return ordered
    .map((rule) => {
      const description =
        registry.ruleDescriptions[rule] ?? describeRuleName(rule);
      return `- \`${rule}\` — ${description}`;
    })
    .join("\n");
};

const renderEnvironment = (args: {
  registry: Registry;
  selectedLanguages: ReadonlyArray<string>;
}): string => {
  const { registry, selectedLanguages } = args;
  const lines: Array<string> = [];

  for (const language of [...new Set(selectedLanguages)].sort()) {
    const snippets = registry.environmentSnippets[language];
    if (snippets == null) {
      continue;
    }
    if (snippets.setup != null) {
      lines.push(`${snippets.setup}  # Setup`);
    }
    if (snippets.test != null) {
      lines.push(`${snippets.test}  # Tests`);
    }
  }

  return lines.length > 0
    ? lines.join("\n")
    : "# No language-specific commands configured";
};

/**
 * Render the generated block
 *
 * The output depends only on the set of rules and languages, never on the
 * order they are passed in.
 *
 * @param args - Render arguments
 * @param args.registry - Content registry (tooling categories, descriptions, snippets)
 * @param args.deployedRules - Rule file names deployed to .claude/rules
 * @param args.selectedLanguages - Selected language items
 *
 * @returns Block text from start marker to end marker, with a trailing newline
 */
export const renderBlock = (args: {
  registry: Registry;
  deployedRules: ReadonlyArray<string>;
  selectedLanguages: ReadonlyArray<string>;
}): string => {
  const rules = renderRules(args);
  const environment = renderEnvironment(args);

  return [
    BLOCK_START,
    "## Rules",
    "",
    "Read rules in `.claude/rules/` before making changes:",
    rules,
    "",
    "## Environment",
    "",
    "```bash",
    environment,
    "```",
    "",
    "## Architecture",
    "",
    "Read `codemaps/INDEX.md` before modifying unfamiliar modules.",
    "Run `/update-codemaps` after significant structural changes.",
    "",
    "## Documentation",
    "",
    "Read `docs/` for detailed project documentation (if it exists).",
    "- `docs/ARCHITECTURE.md` — design decisions and patterns",
    "- `docs/DEVELOPMENT.md` — setup and workflow guides",
    BLOCK_END,
    "",
  ].join("\n");
};

/**
 * Replace the generated block of a document
 *
 * The span from the first start marker through the first end marker after it
 * is replaced by the trimmed block. The document is handled as raw bytes, so
 * content outside the span keeps its encoding whatever it is.
 *
 * @param existing - Current document bytes
 * @param block - New block
 *
 * @returns Updated document, or the input unchanged when a marker is missing
 */
export const spliceUpdate = (existing: Buffer, block: string): Buffer => {
  const start = existing.indexOf(BLOCK_START);
  if (start === -1) {
    return existing;
  }
  const end = existing.indexOf(
    BLOCK_END,
    start + Buffer.byteLength(BLOCK_START),
  );
  if (end === -1) {
    return existing;
  }

  return Buffer.concat([
    existing.subarray(0, start),
    Buffer.from(block.trim(), "utf-8"),
    existing.subarray(end + Buffer.byteLength(BLOCK_END)),
  ]);
};

/**
 * Put the generated block in front of a document without one
 * @param existing - Current document bytes
 * @param block - New block
 *
 * @returns Block, a newline, then the untouched document
 */
export const splicePrepend = (existing: Buffer, block: string): Buffer => {
  return Buffer.concat([Buffer.from(`${block}\n`, "utf-8"), existing]);
};

/**
 * Build a fresh CLAUDE.md
 * @param args - Document arguments
 * @param args.projectName - Project name for the title
 * @param args.block - Generated block
 *
 * @returns Document content
 */
export const createDocument = (args: {
  projectName: string;
  block: string;
}): string => {
  const { projectName, block } = args;
  return `# ${projectName}\n\n${block}\n`;
};
