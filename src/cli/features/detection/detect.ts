/**
 * Project detection
 *
 * Detection only proposes defaults for the selection step. Nothing here
 * writes to the project.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { debug } from "@/cli/logger.js";
import { pathExists } from "@/utils/fs.js";

import type {
  DetectionMetadata,
  Registry,
} from "@/cli/features/registry/types.js";
import type { Dirent } from "fs";

/** Directory levels scanned for file extensions (the root is level 0) */
const SCAN_DEPTH = 3;

const DEPENDENCY_FILES = ["package.json", "pyproject.toml", "requirements.txt"];

/**
 * Evidence gathered from a project directory
 */
export type ProjectScan = {
  projectDir: string;
  /** File extensions found near the root (e.g. ".py") */
  extensions: Set<string>;
  /** Lowercased concatenation of the dependency manifests */
  dependencyText: string;
};

/** category -> detected items, in registry order */
export type DetectedItems = Record<string, Array<string>>;

/**
 * Collect file extensions within the top directory levels
 *
 * Hidden directories and node_modules are not entered.
 *
 * @param projectDir - Project root
 *
 * @returns Extensions including the leading dot
 */
export const scanExtensions = async (
  projectDir: string,
): Promise<Set<string>> => {
  const extensions = new Set<string>();

  const walk = async (dir: string, depth: number): Promise<void> => {
    if (depth >= SCAN_DEPTH) {
      return;
    }

    let entries: Array<Dirent>;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      debug({ message: `Skipping unreadable directory ${dir}: ${String(err)}` });
      return;
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (entry.name.startsWith(".") || entry.name === "node_modules") {
          continue;
        }
        await walk(path.join(dir, entry.name), depth + 1);
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name);
        if (ext !== "") {
          extensions.add(ext);
        }
      }
    }
  };

  await walk(projectDir, 0);
  return extensions;
};

const readDependencyText = async (projectDir: string): Promise<string> => {
  let text = "";
  for (const name of DEPENDENCY_FILES) {
    text += await fs
      .readFile(path.join(projectDir, name), "utf-8")
      .catch(() => "");
  }
  return text.toLowerCase();
};

/**
 * Gather detection evidence for a project
 * @param args - Scan arguments
 * @param args.projectDir - Project root
 *
 * @returns Project scan
 */
export const scanProject = async (args: {
  projectDir: string;
}): Promise<ProjectScan> => {
  const { projectDir } = args;
  return {
    projectDir,
    extensions: await scanExtensions(projectDir),
    dependencyText: await readDependencyText(projectDir),
  };
};

const isDirectory = async (dir: string): Promise<boolean> => {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Decide whether one modular item matches a project
 * @param args - Match arguments
 * @param args.scan - Project scan
 * @param args.detection - Detection metadata of the item
 *
 * @returns True when any signal matches and the item is not manual-only
 */
export const matchesDetection = async (args: {
  scan: ProjectScan;
  detection: DetectionMetadata;
}): Promise<boolean> => {
  const { scan, detection } = args;
  if (detection.manual === true) {
    return false;
  }

  if ((detection.extensions ?? []).some((ext) => scan.extensions.has(ext))) {
    return true;
  }
  for (const configFile of detection.configFiles ?? []) {
    if (await pathExists(path.join(scan.projectDir, configFile))) {
      return true;
    }
  }
  if (
    (detection.dependencyKeywords ?? []).some((keyword) =>
      scan.dependencyText.includes(keyword.toLowerCase()),
    )
  ) {
    return true;
  }
  for (const dir of detection.directories ?? []) {
    if (await isDirectory(path.join(scan.projectDir, dir))) {
      return true;
    }
  }
  return false;
};

/**
 * Detect the items of one modular category
 * @param args - Detection arguments
 * @param args.registry - Content registry
 * @param args.scan - Project scan
 * @param args.category - Modular category key
 *
 * @returns Matching items in registry order
 */
export const detectCategory = async (args: {
  registry: Registry;
  scan: ProjectScan;
  category: string;
}): Promise<Array<string>> => {
  const { registry, scan, category } = args;
  const detected: Array<string> = [];
  for (const [item, detection] of Object.entries(
    registry.modularRules[category] ?? {},
  )) {
    if (await matchesDetection({ scan, detection })) {
      detected.push(item);
    }
  }
  return detected;
};

export const detectLanguages = async (args: {
  registry: Registry;
  scan: ProjectScan;
}): Promise<Array<string>> => {
  return detectCategory({ ...args, category: "lang" });
};

export const detectTemplates = async (args: {
  registry: Registry;
  scan: ProjectScan;
}): Promise<Array<string>> => {
  return detectCategory({ ...args, category: "templates" });
};

export const detectPlatform = async (args: {
  registry: Registry;
  scan: ProjectScan;
}): Promise<Array<string>> => {
  return detectCategory({ ...args, category: "platform" });
};

/**
 * Detect items across every modular category
 * @param args - Detection arguments
 * @param args.projectDir - Project root
 * @param args.registry - Content registry
 *
 * @returns Detected items per category; categories without a match are omitted
 */
export const detectProject = async (args: {
  projectDir: string;
  registry: Registry;
}): Promise<DetectedItems> => {
  const { projectDir, registry } = args;
  const scan = await scanProject({ projectDir });

  const detected: DetectedItems = {};
  for (const category of Object.keys(registry.modularRules)) {
    const items = await detectCategory({ registry, scan, category });
    if (items.length > 0) {
      detected[category] = items;
    }
  }
  return detected;
};
