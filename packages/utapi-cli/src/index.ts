#!/usr/bin/env tsx

/**
 * utapi CLI - manage UploadThing files from the terminal
 */

import { Command } from "commander";
import { createRequire } from "module";
import { registerFilesCommands } from "./commands/files.js";
import { registerInfoCommands } from "./commands/info.js";
import { registerAccessCommand } from "./commands/access.js";
import { registerUploadCommand } from "./commands/upload.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

const program = new Command();

program
  .name("utapi")
  .description("UploadThing file management CLI")
  .version(pkg.version);

// File management subcommand group (utapi files list|delete|rename)
const filesCmd = program
  .command("files")
  .description("List, delete and rename files");

registerFilesCommands(filesCmd);

// utapi usage|app-info
registerInfoCommands(program);

// utapi access <fileKey>
registerAccessCommand(program);

// utapi upload <paths...>
registerUploadCommand(program);

await program.parseAsync();
