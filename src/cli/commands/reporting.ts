/**
 * Console output for deployment reports
 */

import { debug, error, raw, warn } from "@/cli/logger.js";

import type { DeploymentReport } from "@/cli/features/reconcile/types.js";

/**
 * Print the warnings and failures of a set of reports
 *
 * Missing sources are warnings. Entries left alone because another namespace
 * owns them are expected on every run and only show up in debug output. When
 * a category has failures, what did succeed in it is listed after them.
 *
 * @param args - Logging arguments
 * @param args.reports - Reports to print
 *
 * @returns Number of write failures
 */
export const logReports = (args: {
  reports: ReadonlyArray<DeploymentReport>;
}): number => {
  let failures = 0;

  for (const report of args.reports) {
    for (const warning of report.warnings) {
      if (warning.type === "skipped-missing-source") {
        warn({
          message: `Skipped ${report.category}/${warning.identifier}: source not found at ${warning.sourcePath}`,
        });
      } else {
        debug({
          message: `Kept ${report.category}/${warning.name} (${warning.ownership.type})`,
        });
      }
    }

    if (report.errors.length === 0) {
      continue;
    }
    for (const failure of report.errors) {
      failures += 1;
      error({
        message: `Failed to update ${failure.destPath}: ${failure.message}`,
      });
    }
    for (const entry of report.deployed) {
      raw({ message: `  Deployed ${report.category}/${entry.destName}` });
    }
    for (const name of report.removed) {
      raw({ message: `  Removed ${report.category}/${name}` });
    }
  }

  return failures;
};
