// src/core/root.ts
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { BUMP_TYPES } from "../services/version.js";
import { DEFAULT_PROMPTS } from "../services/prompts.js";

const CONFIG_DIR = ".aicommit";
export const CONFIG_PATH = path.join(CONFIG_DIR, "config.yml");

export const ConfigSchema = z.object({
  model: z.string().min(1).default("llama3:latest"),
  ollamaUrl: z.string().url().default("http://127.0.0.1:11434"),
  bump: z.enum(BUMP_TYPES).default("patch"),
  language: z.string().min(1).default("english"),
  remote: z.string().min(1).default("origin"),

  // Only used by the liveness probe; generation itself waits for the model
  connectTimeoutMs: z.number().int().positive().default(1000),

  fragment: z
    .object({
      lines: z.number().int().positive().default(5),
      retryLines: z.number().int().positive().default(3)
    })
    .default({ lines: 5, retryLines: 3 }),

  prompts: z
    .object({
      primary: z.string().min(1).default(DEFAULT_PROMPTS.primary),
      fallback: z.string().min(1).default(DEFAULT_PROMPTS.fallback)
    })
    .default(DEFAULT_PROMPTS)
});

export type FileConfig = z.infer<typeof ConfigSchema>;

export async function findRoot(start: string): Promise<string | null> {
  let dir = start;
  while (true) {
    if (fs.existsSync(path.join(dir, ".git"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export async function ensureProjectRoot(cwd: string): Promise<string> {
  const root = await findRoot(cwd);
  if (!root) {
    throw new Error("Not inside a Git repo. Run git-ai-commit from a repository (or `git init` first).");
  }
  return root;
}
