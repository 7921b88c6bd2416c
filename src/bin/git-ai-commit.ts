#!/usr/bin/env node
import { Command } from "commander";
import { log } from "../core/logger.js";
import { registerCommitAction } from "../commands/commit.js";
import { configCommand } from "../commands/config.js";
import { doctorCommand } from "../commands/doctor.js";

const program = new Command();
program
  .name("git-ai-commit")
  .description("Commit with a message written by a local Ollama model, then bump the version tag")
  .version("1.0.0");

registerCommitAction(program);
program.addCommand(configCommand);
program.addCommand(doctorCommand);

program.parseAsync(process.argv).catch((e: unknown) => {
  log.err(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
});
