// src/services/preflight.ts
import fs from "node:fs";
import path from "node:path";
import { execa } from "execa";
import { CONFIG_PATH, findRoot } from "../core/root.js";
import { ServiceUnavailableError } from "../core/errors.js";
import type { RunConfig } from "./config.js";
import { OllamaClient } from "./ollama.js";

export type ToolCheck = {
  name: string;
  ok: boolean;
  version?: string | null;
  message?: string;
  required?: boolean;
};

const installDocs: Record<string, string> = {
  git: "https://git-scm.com/downloads",
  ollama: "https://ollama.com/download (then run `ollama serve`)",
  repository: "Run git-ai-commit inside a git working tree (or `git init`).",
  [CONFIG_PATH]: "Optional. Create it with `git-ai-commit config --init`."
};

/** `<bin> --version`, or null when the binary is missing or fails. */
export async function versionSafe(
  bin: string,
  args: string[] = ["--version"]
): Promise<string | null> {
  try {
    const { stdout } = await execa(bin, args);
    return typeof stdout === "string" ? stdout.trim() : null;
  } catch {
    return null;
  }
}

export function installHint(name: string): string {
  if (name.startsWith("model ")) return `ollama pull ${name.slice("model ".length)}`;
  return installDocs[name] ?? "Search your package manager or vendor docs.";
}

/** Check git, the repository, the config file, Ollama and the configured model. */
export async function checkTools(cfg: RunConfig): Promise<ToolCheck[]> {
  const results: ToolCheck[] = [];

  const gitVersion = await versionSafe("git");
  results.push(
    gitVersion
      ? { name: "git", ok: true, version: gitVersion, required: true }
      : { name: "git", ok: false, version: null, required: true, message: "Command failed or not found" }
  );

  const root = await findRoot(cfg.cwd);
  results.push({
    name: "repository",
    ok: root !== null,
    required: true,
    version: root,
    message: root ? undefined : `No .git found above ${cfg.cwd}`
  });

  const hasCfg = root !== null && fs.existsSync(path.join(root, CONFIG_PATH));
  results.push({
    name: CONFIG_PATH,
    ok: hasCfg,
    required: false,
    message: hasCfg ? undefined : "Not present, using defaults"
  });

  const ollama = new OllamaClient(cfg.ollamaUrl, cfg.connectTimeoutMs);
  const reachable = await ollama.isReachable();
  results.push({
    name: "ollama",
    ok: reachable,
    required: false,
    version: reachable ? cfg.ollamaUrl : null,
    message: reachable ? undefined : `Not running at ${cfg.ollamaUrl}`
  });
  if (!reachable) return results;

  let loaded = false;
  let message: string | undefined = `Not loaded in Ollama`;
  try {
    loaded = await ollama.hasModel(cfg.model);
    if (loaded) message = undefined;
  } catch (e) {
    if (!(e instanceof ServiceUnavailableError)) throw e;
    message = e.message;
  }
  results.push({ name: `model ${cfg.model}`, ok: loaded, required: false, message });

  return results;
}
