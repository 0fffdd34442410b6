#!/usr/bin/env node

/**
 * foundry CLI router
 *
 * Routes commands to their handlers using commander.js.
 */

import { Command } from "commander";

import { registerInitCommand } from "@/cli/commands/init/init.js";
import { registerPrivateCommand } from "@/cli/commands/private/private.js";
import { registerStatusCommand } from "@/cli/commands/status/status.js";
import { setSilentMode } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";

const program = new Command();
const version = getCurrentPackageVersion() ?? "unknown";

program
  .name("foundry")
  .version(version)
  .description(`foundry - .claude/ directory setup v${version}`)
  .option("-s, --silent", "Suppress all output")
  .hook("preAction", () => {
    if (program.opts<{ silent?: boolean }>().silent === true) {
      setSilentMode({ silent: true });
    }
  })
  .addHelpText(
    "after",
    `
Examples:
  $ foundry init
  $ foundry init ~/work/app --non-interactive
  $ foundry init --non-interactive --force
  $ foundry private add ../team-config --prefix acme
  $ foundry private list
  $ foundry private remove acme
  $ foundry status
`,
  );

registerInitCommand({ program });
registerPrivateCommand({ program });
registerStatusCommand({ program });

// Show help if no command provided
if (process.argv.length < 3) {
  program.help();
}

await program.parseAsync(process.argv);
