import { describe, it, expect, vi, beforeEach } from "vitest";

import { debug, error, raw, warn } from "@/cli/logger.js";

import type { DeploymentReport } from "@/cli/features/reconcile/types.js";

import { logReports } from "./reporting.js";

vi.mock("@/cli/logger.js", () => ({
  debug: vi.fn(),
  error: vi.fn(),
  raw: vi.fn(),
  warn: vi.fn(),
}));

const report = (partial: Partial<DeploymentReport>): DeploymentReport => ({
  category: "agents",
  deployed: [],
  removed: [],
  warnings: [],
  errors: [],
  ...partial,
});

describe("logReports", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should print nothing but debug output for a clean pass", () => {
    const failures = logReports({
      reports: [
        report({
          deployed: [{ identifier: "code-reviewer.md", destName: "code-reviewer.md" }],
          warnings: [
            {
              type: "skipped-protected",
              name: "mine.md",
              ownership: { type: "protected" },
            },
          ],
        }),
      ],
    });

    expect(failures).toBe(0);
    expect(raw).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledWith({
      message: "Kept agents/mine.md (protected)",
    });
  });

  it("should warn about missing sources", () => {
    logReports({
      reports: [
        report({
          category: "rules",
          warnings: [
            {
              type: "skipped-missing-source",
              identifier: "python.md",
              sourcePath: "/content/rule-library/lang/python.md",
            },
          ],
        }),
      ],
    });

    expect(warn).toHaveBeenCalledWith({
      message:
        "Skipped rules/python.md: source not found at /content/rule-library/lang/python.md",
    });
  });

  it("should itemize what succeeded next to what failed", () => {
    const failures = logReports({
      reports: [
        report({
          deployed: [
            { identifier: "code-reviewer.md", destName: "code-reviewer.md" },
          ],
          removed: ["old-reviewer.md"],
          errors: [
            {
              identifier: "python-reviewer.md",
              destPath: "/work/app/.claude/agents/python-reviewer.md",
              message: "EACCES: permission denied",
            },
          ],
        }),
        report({
          category: "rules",
          deployed: [{ identifier: "testing.md", destName: "testing.md" }],
        }),
      ],
    });

    expect(failures).toBe(1);
    expect(error).toHaveBeenCalledWith({
      message:
        "Failed to update /work/app/.claude/agents/python-reviewer.md: EACCES: permission denied",
    });
    expect(vi.mocked(raw).mock.calls).toEqual([
      [{ message: "  Deployed agents/code-reviewer.md" }],
      [{ message: "  Removed agents/old-reviewer.md" }],
    ]);
  });
});
