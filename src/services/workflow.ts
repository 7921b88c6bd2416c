// src/services/workflow.ts
import { ServiceUnavailableError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { generateCommitMessage } from "./commitmsg.js";
import type { RunConfig } from "./config.js";
import type { GitClient } from "./git.js";
import type { CompletionClient } from "./ollama.js";
import { summarizeChanges } from "./summarizer.js";
import { latestVersion, nextTag } from "./version.js";

export interface ModelService extends CompletionClient {
  readonly baseUrl: string;
  isReachable(): Promise<boolean>;
  hasModel(model: string): Promise<boolean>;
}

export type WorkflowDeps = {
  git: GitClient;
  ollama: ModelService;
  log: Logger;
};

export type CommitOutcome =
  | { kind: "unavailable"; reason: string }
  | { kind: "no-changes" }
  | { kind: "dry-run"; message: string; tag: string }
  | { kind: "committed"; message: string; tag: string };

export type TagOutcome =
  | { kind: "tag-preview"; tag: string }
  | { kind: "tagged"; tag: string };

/** A dry-run falls back to local tags when the remote cannot be fetched. */
async function computeNextTag(cfg: RunConfig, deps: WorkflowDeps): Promise<string> {
  try {
    await deps.git.fetchTags(cfg.remote);
  } catch (e) {
    if (!cfg.dryRun) throw e;
    deps.log.warn(`Could not fetch tags from ${cfg.remote}; using local tags only.`);
  }
  const tags = await deps.git.listTags();
  if (tags.length && !latestVersion(tags)) {
    deps.log.warn(`Ignoring ${tags.length} tag(s) that are not vMAJOR.MINOR.PATCH.`);
  }
  return nextTag(tags, cfg.bump);
}

async function publishTag(cfg: RunConfig, git: GitClient, tag: string) {
  await git.createTag(tag);
  await git.pushTag(cfg.remote, tag);
}

/** Bump and publish the version tag without touching the working tree. */
export async function runTagOnly(cfg: RunConfig, deps: WorkflowDeps): Promise<TagOutcome> {
  deps.log.step("Working with tags only...");
  const tag = await computeNextTag(cfg, deps);
  if (cfg.dryRun) return { kind: "tag-preview", tag };
  await publishTag(cfg, deps.git, tag);
  return { kind: "tagged", tag };
}

/**
 * Summarize pending changes, generate a message, commit, push, then tag.
 * Git failures propagate as-is; nothing already done is rolled back.
 */
export async function runCommit(cfg: RunConfig, deps: WorkflowDeps): Promise<CommitOutcome> {
  const { git, ollama, log } = deps;

  if (!(await ollama.isReachable())) {
    return { kind: "unavailable", reason: `Ollama server is not running at ${ollama.baseUrl}` };
  }

  let message: string;
  try {
    if (!(await ollama.hasModel(cfg.model))) {
      return { kind: "unavailable", reason: `Model ${cfg.model} is not loaded in Ollama` };
    }

    const fragment = await summarizeChanges(git, {
      lines: cfg.fragmentLines,
      retryLines: cfg.retryFragmentLines
    });
    if (!fragment) return { kind: "no-changes" };
    log.info(`Summarizing ${fragment.source} changes (${fragment.files.length} file(s))`);

    message = await generateCommitMessage({
      client: ollama,
      fragment,
      model: cfg.model,
      language: cfg.language,
      prompts: cfg.prompts,
      retryLines: cfg.retryFragmentLines,
      log
    });
  } catch (e) {
    if (e instanceof ServiceUnavailableError) return { kind: "unavailable", reason: e.message };
    throw e;
  }
  log.info(`Generated message: ${message}`);

  if (cfg.dryRun) {
    const tag = await computeNextTag(cfg, deps);
    return { kind: "dry-run", message, tag };
  }

  await git.addAll();
  await git.commit(message);
  await git.push();

  const tag = await computeNextTag(cfg, deps);
  await publishTag(cfg, git, tag);
  return { kind: "committed", message, tag };
}
