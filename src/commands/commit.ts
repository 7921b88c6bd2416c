// src/commands/commit.ts
import { Command, Option } from "commander";
import { GenerationFailedError } from "../core/errors.js";
import { log } from "../core/logger.js";
import { ensureProjectRoot } from "../core/root.js";
import { loadRunConfig, type CliFlags, type RunConfig } from "../services/config.js";
import { Git } from "../services/git.js";
import { OllamaClient } from "../services/ollama.js";
import { BUMP_TYPES } from "../services/version.js";
import { runCommit, runTagOnly, type WorkflowDeps } from "../services/workflow.js";

async function tagOnly(cfg: RunConfig, deps: WorkflowDeps) {
  const outcome = await runTagOnly(cfg, deps);
  if (outcome.kind === "tag-preview") {
    log.info(`Dry-run: new tag will be: ${outcome.tag}`);
    return;
  }
  log.ok(`New tag created: ${outcome.tag}`);
  log.ok("Tag successfully created and pushed.");
}

async function commit(cfg: RunConfig, deps: WorkflowDeps) {
  try {
    const outcome = await runCommit(cfg, deps);
    switch (outcome.kind) {
      case "unavailable":
        // Not our failure: report and leave with status 0
        log.warn(outcome.reason);
        return;
      case "no-changes":
        log.info("No changes to commit");
        return;
      case "dry-run":
        log.info(`Dry-run: new tag would be: ${outcome.tag}`);
        log.info("Dry-run: changes will not be committed and pushed.");
        return;
      case "committed":
        log.ok(`New tag created: ${outcome.tag}`);
        log.ok("Commit and tag successfully created and pushed.");
        return;
    }
  } catch (e) {
    if (!(e instanceof GenerationFailedError)) throw e;
    log.err(e.message);
    if (e.body) console.error(e.body);
    process.exitCode = 1;
  }
}

export function registerCommitAction(program: Command) {
  program
    .option("--model <name>", "Ollama model (default: llama3:latest)")
    .addOption(new Option("--bump <type>", "Version bump after the commit").choices(BUMP_TYPES))
    .option("--dry-run", "Show the message and tag without committing")
    .option("--lang <language>", "Message language (default: english)")
    .addOption(
      new Option("--tag [type]", "Work only with tags: patch|minor|major (default: patch)")
        .choices(BUMP_TYPES)
        .preset("patch")
    )
    .action(async (opts: CliFlags) => {
      const root = await ensureProjectRoot(process.cwd());
      const cfg = await loadRunConfig(root, opts);
      const deps: WorkflowDeps = {
        git: new Git(cfg.cwd),
        ollama: new OllamaClient(cfg.ollamaUrl, cfg.connectTimeoutMs),
        log
      };

      if (cfg.tagOnly) await tagOnly(cfg, deps);
      else await commit(cfg, deps);
    });
}
