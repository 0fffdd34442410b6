/**
 * Selection walk for `foundry init`
 *
 * The walk is a list of steps (base rules, every modular category, hooks,
 * agents, skills, learned categories, plugins, MCP servers). Each step turns
 * the answers so far into a prompt, so defaults that depend on earlier
 * answers (hooks follow the selected languages) are recomputed when the
 * user goes back and changes them.
 */

import { getModularCategories } from "@/cli/features/registry/registry.js";

import type { DetectedItems } from "@/cli/features/detection/detect.js";
import type { ProjectSelections } from "@/cli/features/manifest/manifest.js";
import type { Manifest } from "@/cli/features/manifest/types.js";
import type { Registry } from "@/cli/features/registry/types.js";
import type {
  SelectionOption,
  SelectionPrompt,
  SelectionResolver,
} from "./types.js";

/** Modular items that pull in the TypeScript agents */
const TYPESCRIPT_ITEMS = new Set(["nodejs.md", "react-app.md"]);

export type McpServerOption = {
  name: string;
  description: string;
};

/**
 * Everything the walk needs besides the resolver
 */
export type SelectionContext = {
  registry: Registry;
  /** Migrated manifest of a previous run; its selections become the defaults */
  manifest: Manifest | null;
  detected: DetectedItems;
  agentFiles: ReadonlyArray<string>;
  learnedCategories: ReadonlyArray<string>;
  mcpServers: ReadonlyArray<McpServerOption>;
};

export type SelectionOutcome =
  | { type: "resolved"; selections: ProjectSelections }
  | { type: "quit" };

type Answers = Map<string, Array<string>>;

type SelectionStep = {
  key: string;
  build: (args: { answers: Answers }) => SelectionPrompt | null;
};

const MODULAR_KEY_PREFIX = "modular:";

/**
 * Collect the modular items chosen so far
 * @param answers - Answers per step key
 *
 * @returns Selected modular items across every category
 */
const selectedModularItems = (answers: Answers): Set<string> => {
  const items = new Set<string>();
  for (const [key, selected] of answers) {
    if (key.startsWith(MODULAR_KEY_PREFIX)) {
      selected.forEach((item) => items.add(item));
    }
  }
  return items;
};

/**
 * List the plugin choices for the selected modular items
 *
 * LSP plugins of the selected items come first, once each, in registry
 * order; workflow plugins follow.
 *
 * @param args - Listing arguments
 * @param args.registry - Content registry
 * @param args.selectedItems - Selected modular items
 *
 * @returns Plugin options
 */
export const listPluginOptions = (args: {
  registry: Registry;
  selectedItems: ReadonlySet<string>;
}): Array<SelectionOption> => {
  const { registry, selectedItems } = args;
  const options: Array<SelectionOption> = [];
  const seen = new Set<string>();

  for (const category of getModularCategories({ registry })) {
    for (const item of Object.keys(registry.modularRules[category])) {
      const lsp = registry.lspPlugins[item];
      if (!selectedItems.has(item) || lsp == null || seen.has(lsp.plugin)) {
        continue;
      }
      seen.add(lsp.plugin);
      options.push({ value: lsp.plugin, description: `LSP: ${lsp.binary}` });
    }
  }

  for (const plugin of registry.workflowPlugins) {
    options.push({ value: plugin.name, description: plugin.description });
  }
  return options;
};

/**
 * Propose agents for the selected modular items
 * @param args - Default arguments
 * @param args.agentFiles - Shipped agent files
 * @param args.selectedItems - Selected modular items
 *
 * @returns Agent files matching an item key (e.g. "python-reviewer.md" for "python.md")
 */
export const defaultAgents = (args: {
  agentFiles: ReadonlyArray<string>;
  selectedItems: ReadonlySet<string>;
}): Array<string> => {
  const { agentFiles, selectedItems } = args;
  const keys = [...selectedItems].map((item) => item.replace(/\.md$/, ""));
  const wantsTypescript = [...selectedItems].some((item) =>
    TYPESCRIPT_ITEMS.has(item),
  );

  return agentFiles.filter(
    (file) =>
      keys.some(
        (key) =>
          file.includes(`-${key}.`) ||
          file.startsWith(`${key}.`) ||
          file.startsWith(`${key}-`),
      ) ||
      (wantsTypescript && file.includes("typescript")),
  );
};

const keepAvailable = (
  values: ReadonlyArray<string>,
  options: ReadonlyArray<SelectionOption>,
): Array<string> => {
  return options
    .map((option) => option.value)
    .filter((value) => values.includes(value));
};

const plainOptions = (values: ReadonlyArray<string>): Array<SelectionOption> => {
  return values.map((value) => ({ value }));
};

/**
 * Build the ordered steps of the walk
 * @param context - Selection context
 *
 * @returns Steps in walk order
 */
export const buildSelectionSteps = (
  context: SelectionContext,
): Array<SelectionStep> => {
  const { registry, manifest, detected } = context;

  // A previous answer to the same step wins over computed defaults, so going
  // back shows what the user picked last time.
  const prompt = (args: {
    key: string;
    title: string;
    options: ReadonlyArray<SelectionOption>;
    answers: Answers;
    fromManifest: ReadonlyArray<string> | null;
    computed: () => ReadonlyArray<string>;
    required?: boolean | null;
  }): SelectionPrompt | null => {
    const { key, title, options, answers, fromManifest, computed } = args;
    if (options.length === 0) {
      return null;
    }
    const defaults =
      answers.get(key) ?? (manifest != null ? fromManifest ?? [] : computed());
    return {
      key,
      title,
      options,
      defaults: keepAvailable(defaults, options),
      required: args.required ?? false,
    };
  };

  const steps: Array<SelectionStep> = [
    {
      key: "base",
      build: ({ answers }) =>
        prompt({
          key: "base",
          title: "Base Rules (all recommended)",
          options: plainOptions(registry.baseRules),
          answers,
          fromManifest: manifest?.baseSelections ?? null,
          computed: () => registry.baseRules,
        }),
    },
  ];

  for (const category of getModularCategories({ registry })) {
    const key = `${MODULAR_KEY_PREFIX}${category}`;
    const required = registry.requiredCategories.includes(category);
    steps.push({
      key,
      build: ({ answers }) =>
        prompt({
          key,
          title: `Rules: ${category}/${required ? " (select at least one)" : ""}`,
          options: plainOptions(Object.keys(registry.modularRules[category])),
          answers,
          fromManifest: manifest?.modularSelections[category] ?? null,
          computed: () => detected[category] ?? [],
          required,
        }),
    });
  }

  steps.push(
    {
      key: "hooks",
      build: ({ answers }) =>
        prompt({
          key: "hooks",
          title: "Hooks (auto-selected by language)",
          options: Object.entries(registry.hookScripts).map(
            ([value, hook]) => ({ value, description: hook.description }),
          ),
          answers,
          fromManifest: manifest?.hookSelections ?? null,
          computed: () => {
            const items = selectedModularItems(answers);
            return Object.entries(registry.hookScripts)
              .filter(([, hook]) => hook.languages.some((l) => items.has(l)))
              .map(([script]) => script);
          },
        }),
    },
    {
      key: "agents",
      build: ({ answers }) =>
        prompt({
          key: "agents",
          title: "Agents",
          options: plainOptions(context.agentFiles),
          answers,
          fromManifest: manifest?.agentSelections ?? null,
          computed: () =>
            defaultAgents({
              agentFiles: context.agentFiles,
              selectedItems: selectedModularItems(answers),
            }),
        }),
    },
    {
      key: "skills",
      build: ({ answers }) =>
        prompt({
          key: "skills",
          title: "Skills",
          options: plainOptions(Object.keys(registry.skills)),
          answers,
          fromManifest: manifest?.skillSelections ?? null,
          computed: () => {
            const items = selectedModularItems(answers);
            return Object.entries(registry.skills)
              .filter(([, skill]) => skill.selectedBy.some((i) => items.has(i)))
              .map(([name]) => name);
          },
        }),
    },
    {
      key: "learned",
      build: ({ answers }) =>
        prompt({
          key: "learned",
          title: "Learned Skills (categories)",
          options: plainOptions(context.learnedCategories),
          answers,
          fromManifest: manifest?.learnedCategories ?? null,
          computed: () => context.learnedCategories,
        }),
    },
    {
      key: "plugins",
      build: ({ answers }) => {
        const options = listPluginOptions({
          registry,
          selectedItems: selectedModularItems(answers),
        });
        return prompt({
          key: "plugins",
          title: "Plugins",
          options,
          answers,
          fromManifest: manifest?.pluginSelections ?? null,
          computed: () => options.map((option) => option.value),
        });
      },
    },
    {
      key: "mcp",
      build: ({ answers }) =>
        prompt({
          key: "mcp",
          title: "MCP Servers (optional)",
          options: context.mcpServers.map((server) => ({
            value: server.name,
            description: server.description,
          })),
          answers,
          fromManifest: manifest?.mcpServerSelections ?? null,
          computed: () => [],
        }),
    },
  );

  return steps;
};

const collectSelections = (args: {
  registry: Registry;
  answers: Answers;
}): ProjectSelections => {
  const { registry, answers } = args;
  const answer = (key: string): Array<string> => [...(answers.get(key) ?? [])];

  const modularSelections: Record<string, Array<string>> = {};
  for (const category of getModularCategories({ registry })) {
    const chosen = answer(`${MODULAR_KEY_PREFIX}${category}`);
    if (chosen.length > 0) {
      modularSelections[category] = chosen;
    }
  }

  return {
    baseSelections: answer("base"),
    modularSelections,
    hookSelections: answer("hooks"),
    agentSelections: answer("agents"),
    skillSelections: answer("skills"),
    learnedCategories: answer("learned"),
    pluginSelections: answer("plugins"),
    mcpServerSelections: answer("mcp"),
  };
};

/**
 * Walk every selection step
 *
 * `back` returns to the previous shown step (or re-shows the first one);
 * `quit` ends the walk without selections. Accepted values are stored in
 * option order, whatever order the resolver returned them in.
 *
 * @param args - Walk arguments
 * @param args.context - Selection context
 * @param args.resolver - Source of answers
 *
 * @returns Resolved selections, or quit
 */
export const resolveSelections = async (args: {
  context: SelectionContext;
  resolver: SelectionResolver;
}): Promise<SelectionOutcome> => {
  const { context, resolver } = args;
  const steps = buildSelectionSteps(context);
  const answers: Answers = new Map();
  const history: Array<number> = [];

  let index = 0;
  while (index < steps.length) {
    const step = steps[index];
    const stepPrompt = step.build({ answers });
    if (stepPrompt == null) {
      answers.delete(step.key);
      index += 1;
      continue;
    }

    const result = await resolver.resolve({ prompt: stepPrompt });
    if (result.type === "quit") {
      return { type: "quit" };
    }
    if (result.type === "back") {
      index = history.pop() ?? index;
      continue;
    }

    answers.set(step.key, keepAvailable(result.selected, stepPrompt.options));
    history.push(index);
    index += 1;
  }

  return {
    type: "resolved",
    selections: collectSelections({ registry: context.registry, answers }),
  };
};
