// src/services/config.ts
import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import type { ZodError } from "zod";
import { CONFIG_PATH, ConfigSchema, findRoot, type FileConfig } from "../core/root.js";
import type { BumpType } from "./version.js";
import type { PromptTemplates } from "./prompts.js";

/** Flags as commander hands them over; every field is optional. */
export type CliFlags = {
  model?: string;
  bump?: BumpType;
  dryRun?: boolean;
  lang?: string;
  tag?: BumpType;
};

export type RunConfig = Readonly<{
  cwd: string;
  model: string;
  ollamaUrl: string;
  bump: BumpType;
  language: string;
  remote: string;
  dryRun: boolean;
  tagOnly: boolean;
  connectTimeoutMs: number;
  fragmentLines: number;
  retryFragmentLines: number;
  prompts: Readonly<PromptTemplates>;
}>;

export function formatConfigError(e: ZodError, source: string): string {
  const lines = e.issues.map(i => ` - ${i.path.join(".") || "(root)"}: ${i.message}`);
  return `Invalid config in ${source}:\n${lines.join("\n")}`;
}

export function parseConfig(raw: unknown, source: string): FileConfig {
  const res = ConfigSchema.safeParse(raw ?? {});
  if (!res.success) throw new Error(formatConfigError(res.error, source));
  return res.data;
}

/** Read `.aicommit/config.yml` under `root`; defaults when the file is absent. */
export function loadConfig(root: string): FileConfig {
  const cfgPath = path.join(root, CONFIG_PATH);
  if (!fs.existsSync(cfgPath)) return ConfigSchema.parse({});
  const raw = yaml.load(fs.readFileSync(cfgPath, "utf-8"));
  return parseConfig(raw, CONFIG_PATH);
}

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

/** File config < environment < CLI flags, frozen once. */
export function resolveRunConfig(opts: {
  cwd: string;
  file: FileConfig;
  flags: CliFlags;
  env?: NodeJS.ProcessEnv;
}): RunConfig {
  const { cwd, file, flags } = opts;
  const env = opts.env ?? process.env;
  const tagOnly = flags.tag !== undefined;

  return Object.freeze({
    cwd,
    model: flags.model ?? fromEnv(env, "GIT_AI_COMMIT_MODEL") ?? file.model,
    ollamaUrl: (fromEnv(env, "OLLAMA_URL") ?? file.ollamaUrl).replace(/\/+$/, ""),
    bump: flags.tag ?? flags.bump ?? file.bump,
    language: flags.lang ?? file.language,
    remote: file.remote,
    dryRun: flags.dryRun ?? false,
    tagOnly,
    connectTimeoutMs: file.connectTimeoutMs,
    fragmentLines: file.fragment.lines,
    retryFragmentLines: file.fragment.retryLines,
    prompts: Object.freeze({ ...file.prompts })
  });
}

/** Config for a command run from `cwd`; defaults apply outside a repository. */
export async function loadRunConfig(cwd: string, flags: CliFlags): Promise<RunConfig> {
  const root = await findRoot(cwd);
  const file = root ? loadConfig(root) : ConfigSchema.parse({});
  return resolveRunConfig({ cwd: root ?? cwd, file, flags });
}
