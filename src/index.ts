#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { checkCommand } from "./cli/commands/check";
import { cleanupCommand } from "./cli/commands/cleanup";
import { listCommand } from "./cli/commands/list";
import { banner, NAME, VERSION } from "./cli/ui";

function printHelp(): void {
  banner();

  p.note(
    `${color.cyan("backup")}      Export the database, rotate old dumps, replicate the tree
${color.cyan("cleanup")}     Apply the retention policy only
${color.cyan("list")}        List artifacts in the archive tree
${color.cyan("check")}       Run the preflight checks only`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `${NAME} backup -d shop -b /home/backups/mysql            ${color.dim("# Local backup")}
${NAME} backup -c shop.conf --retention-days 7          ${color.dim("# Backup + rotation")}
${NAME} cleanup -c shop.conf --dry-run                  ${color.dim("# Preview rotation")}
${NAME} list -b /home/backups/mysql --all               ${color.dim("# List every dump")}
${NAME} check -c shop.conf                              ${color.dim("# Validate setup")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan(`${NAME} <command> --help`)} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "check":
      return checkCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(`${NAME} v${VERSION}`);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan(`${NAME} --help`)} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
