// src/services/prompts.ts
export type PromptTemplates = {
  primary: string;
  fallback: string;
};

export type PromptVars = {
  language: string;
  maxLength: number;
  files: string;
  diff: string;
};

export const DEFAULT_PROMPTS: PromptTemplates = {
  primary: [
    "Write a concise git commit message in {{language}} (max {{maxLength}} chars) for these changes.",
    "Reply with the commit message only, on one line, without quotes or explanations.",
    "Files: {{files}}",
    "Diff: {{diff}}",
    "",
    "Commit message:"
  ].join("\n"),
  fallback: "Generate a short git commit message in {{language}} (under {{maxLength}} characters) for: {{diff}}"
};

const PLACEHOLDER_RE = /\{\{\s*(language|maxLength|files|diff)\s*\}\}/g;

export function renderPrompt(template: string, vars: PromptVars): string {
  return template.replace(PLACEHOLDER_RE, (_m, key: keyof PromptVars) => String(vars[key]));
}
