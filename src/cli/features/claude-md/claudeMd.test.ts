import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  getClaudeMdBackupFile,
  getClaudeMdFile,
} from "@/cli/features/paths.js";
import { createNonInteractiveResolver } from "@/cli/features/selection/resolvers.js";

import type { HeaderChoice } from "@/cli/features/selection/types.js";

import { applyHeader, planHeaderUpdate } from "./claudeMd.js";
import { BLOCK_END, BLOCK_START } from "./header.js";

const BLOCK = `${BLOCK_START}\nnew block\n${BLOCK_END}\n`;

describe("CLAUDE.md writing", () => {
  let tempDir: string;
  let projectDir: string;
  let claudeMdPath: string;

  const interactiveResolver = (choice: HeaderChoice) => ({
    ...createNonInteractiveResolver(),
    interactive: true,
    chooseHeaderAction: vi.fn(async () => choice),
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "claude-md-test-"));
    projectDir = path.join(tempDir, "demo");
    await fs.mkdir(projectDir);
    claudeMdPath = getClaudeMdFile({ projectDir });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("planHeaderUpdate", () => {
    it("should create when there is no CLAUDE.md", async () => {
      expect(
        await planHeaderUpdate({
          projectDir,
          resolver: createNonInteractiveResolver(),
          force: false,
        }),
      ).toEqual({ action: "create" });
    });

    it("should update silently when the block is present", async () => {
      await fs.writeFile(claudeMdPath, `# Mine\n${BLOCK_START}\nx\n${BLOCK_END}\n`);
      const resolver = interactiveResolver("quit");

      expect(
        await planHeaderUpdate({ projectDir, resolver, force: false }),
      ).toEqual({ action: "update" });
      expect(resolver.chooseHeaderAction).not.toHaveBeenCalled();
    });

    it("should skip an unmarked document on a non-interactive run", async () => {
      await fs.writeFile(claudeMdPath, "# Mine\n");

      expect(
        await planHeaderUpdate({
          projectDir,
          resolver: createNonInteractiveResolver(),
          force: false,
        }),
      ).toEqual({ action: "skip" });
    });

    it("should merge an unmarked document when forced", async () => {
      await fs.writeFile(claudeMdPath, "# Mine\n");

      expect(
        await planHeaderUpdate({
          projectDir,
          resolver: createNonInteractiveResolver(),
          force: true,
        }),
      ).toEqual({ action: "merge" });
    });

    it("should ask on an interactive run", async () => {
      await fs.writeFile(claudeMdPath, "# Mine\n\nNotes\n");
      const resolver = interactiveResolver("replace");

      expect(
        await planHeaderUpdate({ projectDir, resolver, force: false }),
      ).toEqual({ action: "replace" });
      expect(resolver.chooseHeaderAction).toHaveBeenCalledWith({
        claudeMdPath,
        lines: 3,
        chars: 14,
      });
    });
  });

  describe("applyHeader", () => {
    it("should create a titled document", async () => {
      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "create" },
        }),
      ).toBe("created");
      expect(await fs.readFile(claudeMdPath, "utf-8")).toBe(
        `# demo\n\n${BLOCK}\n`,
      );
    });

    it("should update only the marked span", async () => {
      await fs.writeFile(
        claudeMdPath,
        `# Mine\n\n${BLOCK_START}\nold\n${BLOCK_END}\n\n## Notes\n`,
      );

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "update" },
        }),
      ).toBe("updated");
      expect(await fs.readFile(claudeMdPath, "utf-8")).toBe(
        `# Mine\n\n${BLOCK_START}\nnew block\n${BLOCK_END}\n\n## Notes\n`,
      );
    });

    it("should keep Latin-1 bytes outside the block on update", async () => {
      const head = Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]);
      const tail = Buffer.from("\nB");
      await fs.writeFile(
        claudeMdPath,
        Buffer.concat([head, Buffer.from(`${BLOCK_START}\nold\n${BLOCK_END}`), tail]),
      );

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "update" },
        }),
      ).toBe("updated");
      expect(await fs.readFile(claudeMdPath)).toEqual(
        Buffer.concat([
          head,
          Buffer.from(`${BLOCK_START}\nnew block\n${BLOCK_END}`),
          tail,
        ]),
      );
    });

    it("should keep Latin-1 bytes in the merged document and its backup", async () => {
      const original = Buffer.from([0x23, 0x20, 0x4e, 0xe9, 0x0a]);
      await fs.writeFile(claudeMdPath, original);

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "merge" },
        }),
      ).toBe("merged");
      expect(await fs.readFile(getClaudeMdBackupFile({ projectDir }))).toEqual(
        original,
      );
      expect(await fs.readFile(claudeMdPath)).toEqual(
        Buffer.concat([Buffer.from(`${BLOCK}\n`), original]),
      );
    });

    it("should report an unchanged document on a repeated update", async () => {
      const content = `# Mine\n\n${BLOCK_START}\nnew block\n${BLOCK_END}\n`;
      await fs.writeFile(claudeMdPath, content);

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "update" },
        }),
      ).toBe("unchanged");
      expect(await fs.readFile(claudeMdPath, "utf-8")).toBe(content);
    });

    it("should warn about a start marker without an end marker", async () => {
      const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      const content = `# Mine\n${BLOCK_START}\nold\n`;
      await fs.writeFile(claudeMdPath, content);

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "update" },
        }),
      ).toBe("unchanged");
      expect(await fs.readFile(claudeMdPath, "utf-8")).toBe(content);
      expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it("should back up before replacing", async () => {
      await fs.writeFile(claudeMdPath, "# Mine\n");

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "replace" },
        }),
      ).toBe("replaced");
      expect(
        await fs.readFile(getClaudeMdBackupFile({ projectDir }), "utf-8"),
      ).toBe("# Mine\n");
      expect(await fs.readFile(claudeMdPath, "utf-8")).toBe(
        `# demo\n\n${BLOCK}\n`,
      );
    });

    it("should back up before merging", async () => {
      await fs.writeFile(claudeMdPath, "# Mine\n");

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "merge" },
        }),
      ).toBe("merged");
      expect(
        await fs.readFile(getClaudeMdBackupFile({ projectDir }), "utf-8"),
      ).toBe("# Mine\n");
      expect(await fs.readFile(claudeMdPath, "utf-8")).toBe(
        `${BLOCK}\n# Mine\n`,
      );
    });

    it("should write nothing for skip", async () => {
      await fs.writeFile(claudeMdPath, "# Mine\n");

      expect(
        await applyHeader({
          projectDir,
          projectName: "demo",
          block: BLOCK,
          plan: { action: "skip" },
        }),
      ).toBeNull();
      expect(await fs.readFile(claudeMdPath, "utf-8")).toBe("# Mine\n");
      await expect(
        fs.access(getClaudeMdBackupFile({ projectDir })),
      ).rejects.toThrow();
    });
  });
});
