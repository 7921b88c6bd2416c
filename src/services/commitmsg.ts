import { GenerationFailedError } from "../core/errors.js";
import { silentLog, type Logger } from "../core/logger.js";
import type { CompletionClient } from "./ollama.js";
import { renderPrompt, type PromptTemplates } from "./prompts.js";
import { sanitizeFragment, type ChangeFragment } from "./summarizer.js";

export const MAX_MESSAGE_LENGTH = 102;
const TRUNCATE_AT = 99;
const TRUNCATION_MARKER = "...";

/** Lengths asked of the model in the prompts. */
export const PRIMARY_TARGET_LENGTH = 100;
export const FALLBACK_TARGET_LENGTH = 50;

const MAX_LISTED_FILES = 10;

// Applied to the collapsed one-line answer, anchored at its start
const PREAMBLE_PATTERNS: RegExp[] = [
  /^(?:sure|okay|ok|certainly)[!,.]\s*/i,
  /^here(?:'s| is| are)\b[^:]{0,80}:\s*/i,
  /^(?:suggested |proposed |git )?commit(?: message)?:\s*/i,
  /^вот\s[^:]{0,80}:\s*/iu,
  /^(?:сообщение|текст) (?:для )?коммита:\s*/iu
];

const LEADING_ARTIFACTS_RE = /^[\s"'`\\/]+/;
const TRAILING_ARTIFACTS_RE = /[\s"'`\\/]+$/;

export function truncateMessage(msg: string): string {
  const chars = Array.from(msg);
  if (chars.length <= MAX_MESSAGE_LENGTH) return msg;
  return chars.slice(0, TRUNCATE_AT).join("") + TRUNCATION_MARKER;
}

/**
 * Turn a raw model answer into a one-line commit message: drop code fences,
 * fold whitespace, strip preambles and quoting, cap the length.
 * Returns "" when nothing usable is left.
 */
export function cleanCommitMessage(text: string): string {
  let msg = text.replace(/```[\w-]*/g, " ").replace(/\s+/g, " ").trim();
  let prev: string;
  do {
    prev = msg;
    for (const re of PREAMBLE_PATTERNS) msg = msg.replace(re, "");
    msg = msg.replace(LEADING_ARTIFACTS_RE, "").replace(TRAILING_ARTIFACTS_RE, "");
  } while (msg !== prev);
  return truncateMessage(msg);
}

const UNSAFE_PATH_CHARS_RE = /[^\p{L}\p{N}._\/-]/gu;

export function describeFiles(files: readonly string[]): string {
  const names = files.map(f => f.replace(UNSAFE_PATH_CHARS_RE, "")).filter(Boolean);
  if (!names.length) return "none";
  const shown = names.slice(0, MAX_LISTED_FILES).join(", ");
  const rest = names.length - MAX_LISTED_FILES;
  return rest > 0 ? `${shown} and ${rest} more` : shown;
}

async function attempt(client: CompletionClient, model: string, prompt: string, label: string) {
  const res = await client.generate(model, prompt);
  if (res.status !== 200) {
    throw new GenerationFailedError(`Ollama returned HTTP ${res.status} on the ${label} request`, res.status, res.body);
  }
  return { message: cleanCommitMessage(res.text), body: res.body };
}

/**
 * Ask the model for a commit message. One fallback request with a simpler
 * prompt and a shorter fragment is made when the first answer cleans up empty.
 */
export async function generateCommitMessage(opts: {
  client: CompletionClient;
  fragment: ChangeFragment;
  model: string;
  language: string;
  prompts: PromptTemplates;
  retryLines: number;
  log?: Logger;
}): Promise<string> {
  const { client, fragment, model, language, prompts } = opts;
  const log = opts.log ?? silentLog;

  const primary = renderPrompt(prompts.primary, {
    language,
    maxLength: PRIMARY_TARGET_LENGTH,
    files: describeFiles(fragment.files),
    diff: fragment.text
  });
  log.step(`Sending request to model ${model}...`);
  const first = await attempt(client, model, primary, "first");
  if (first.message) return first.message;

  log.warn("Model returned an empty message, trying alternative prompt...");
  const fallback = renderPrompt(prompts.fallback, {
    language,
    maxLength: FALLBACK_TARGET_LENGTH,
    files: describeFiles(fragment.files),
    diff: sanitizeFragment(fragment.raw, opts.retryLines)
  });
  const second = await attempt(client, model, fallback, "second");
  if (second.message) return second.message;

  throw new GenerationFailedError("Failed to get commit message from model", 200, second.body);
}
