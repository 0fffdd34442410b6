import type { Ownership } from "@/cli/features/ownership/ownership.js";
import type { DeployCategory } from "@/cli/features/paths.js";

export type ItemShape = "file" | "directory";

/**
 * One unit of content a pass wants present in a category directory
 */
export type DesiredItem = {
  /** Name the item is selected by (e.g. "python.md", "lang/foo.md") */
  identifier: string;
  /** Entry name inside the category directory */
  destName: string;
  sourcePath: string;
  shape: ItemShape;
  /** Add execute permission after copying */
  executable: boolean;
};

export type ReconcileWarning =
  | {
      type: "skipped-missing-source";
      identifier: string;
      sourcePath: string;
    }
  | {
      type: "skipped-protected";
      name: string;
      ownership: Ownership;
    };

export type WriteFailure = {
  identifier: string;
  destPath: string;
  message: string;
};

export type DeployedEntry = {
  identifier: string;
  destName: string;
};

export type DeploymentReport = {
  category: DeployCategory;
  deployed: Array<DeployedEntry>;
  /** Entry names removed from the category directory */
  removed: Array<string>;
  warnings: Array<ReconcileWarning>;
  errors: Array<WriteFailure>;
};
