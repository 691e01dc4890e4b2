#!/usr/bin/env node
import { Command } from "commander";
import { introspectCmd } from "./commands/introspect.js";
import { validateCmd } from "./commands/validate.js";
import { generateCmd } from "./commands/generate.js";
import { importCmd } from "./commands/import.js";

const program = new Command();

program
  .name("datasmith")
  .description("datasmith - multi-table synthetic data with referential integrity")
  .version("0.1.0");

program.addCommand(introspectCmd());
program.addCommand(importCmd());
program.addCommand(validateCmd());
program.addCommand(generateCmd());

await program.parseAsync(process.argv);
