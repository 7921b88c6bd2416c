// src/services/summarizer.ts
import type { GitClient } from "./git.js";

export type ChangeSource = "staged" | "unstaged" | "untracked";

export type ChangeFragment = Readonly<{
  source: ChangeSource;
  files: readonly string[];
  /** Change text before reduction; untracked contents are read only as far as needed. */
  raw: string;
  /** First lines of `raw`, restricted to a payload-safe character set. */
  text: string;
}>;

const UNSAFE_CHARS_RE = /[^\p{L}\p{N}\s._-]/gu;

/**
 * Keep the first `maxLines` lines, drop every character that is not a letter,
 * digit, whitespace, `.`, `_` or `-`, and fold whitespace runs to one space.
 */
export function sanitizeFragment(raw: string, maxLines: number): string {
  return raw
    .split(/\r?\n/)
    .slice(0, maxLines)
    .join("\n")
    .replace(UNSAFE_CHARS_RE, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** Bytes read from each untracked file. */
export const MAX_FILE_BYTES = 64 * 1024;

function countLines(text: string): number {
  return text.split("\n").length - 1;
}

/** Headers and contents of untracked files, read until `maxLines` lines are collected. */
async function untrackedText(git: GitClient, files: readonly string[], maxLines: number): Promise<string> {
  let out = "";
  for (const file of files) {
    if (countLines(out) >= maxLines) break;
    const content = await git.readWorkingFile(file, MAX_FILE_BYTES);
    if (content === null) continue;
    out += `New file: ${file}\n${content}\n`;
  }
  return out;
}

/**
 * Staged diff, else unstaged diff, else the contents of untracked files.
 * Returns null when there is nothing to commit. `retryLines` widens how much
 * untracked content is kept for the fallback prompt.
 */
export async function summarizeChanges(
  git: GitClient,
  opts: { lines: number; retryLines?: number }
): Promise<ChangeFragment | null> {
  let source: ChangeSource = "staged";
  let raw = await git.diff({ staged: true });
  let files: string[] = [];

  if (raw) {
    files = await git.diffFiles({ staged: true });
  } else {
    source = "unstaged";
    raw = await git.diff();
    if (raw) {
      files = await git.diffFiles();
    } else {
      source = "untracked";
      files = await git.untrackedFiles();
      const keep = Math.max(opts.lines, opts.retryLines ?? 0);
      raw = files.length ? await untrackedText(git, files, keep) : "";
    }
  }

  if (!raw) return null;
  return { source, files, raw, text: sanitizeFragment(raw, opts.lines) };
}
