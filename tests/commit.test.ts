import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

vi.mock("../src/services/workflow.js", () => ({ runCommit: vi.fn(), runTagOnly: vi.fn() }));
vi.mock("../src/core/root.js", async importOriginal => ({
  ...(await importOriginal<typeof import("../src/core/root.js")>()),
  ensureProjectRoot: vi.fn(async () => "/nonexistent/repo")
}));

import { Command } from "commander";
import { registerCommitAction } from "../src/commands/commit.js";
import { GenerationFailedError } from "../src/core/errors.js";
import { log } from "../src/core/logger.js";
import { runCommit, runTagOnly } from "../src/services/workflow.js";

function run(...args: string[]) {
  const program = new Command().exitOverride();
  registerCommitAction(program);
  return program.parseAsync(["node", "git-ai-commit", ...args]);
}

beforeEach(() => {
  for (const level of ["info", "ok", "warn", "err", "step"] as const) {
    vi.spyOn(log, level).mockImplementation(() => {});
  }
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.mocked(runCommit).mockReset();
  vi.mocked(runTagOnly).mockReset();
  process.exitCode = undefined;
});

describe("commit command", () => {
  it("exits 1 and prints the raw body when generation fails", async () => {
    vi.mocked(runCommit).mockRejectedValueOnce(
      new GenerationFailedError("Failed to get commit message from model", 200, '{"response":""}')
    );
    await run();
    expect(process.exitCode).toBe(1);
    expect(log.err).toHaveBeenCalledWith("Failed to get commit message from model");
    expect(console.error).toHaveBeenCalledWith('{"response":""}');
  });

  it("leaves the exit code at 0 when Ollama is unavailable", async () => {
    vi.mocked(runCommit).mockResolvedValueOnce({ kind: "unavailable", reason: "Model llama3:latest is not loaded in Ollama" });
    await run();
    expect(process.exitCode).toBeUndefined();
    expect(log.warn).toHaveBeenCalledWith("Model llama3:latest is not loaded in Ollama");
  });

  it("leaves the exit code at 0 when there is nothing to commit", async () => {
    vi.mocked(runCommit).mockResolvedValueOnce({ kind: "no-changes" });
    await run();
    expect(process.exitCode).toBeUndefined();
    expect(log.info).toHaveBeenCalledWith("No changes to commit");
  });

  it("passes flags through to the commit run", async () => {
    vi.mocked(runCommit).mockResolvedValueOnce({ kind: "dry-run", message: "Add notes", tag: "v0.1.0" });
    await run("--dry-run", "--bump", "minor", "--lang", "russian", "--model", "mistral:latest");
    const cfg = vi.mocked(runCommit).mock.calls[0]?.[0];
    expect(cfg).toMatchObject({ dryRun: true, bump: "minor", language: "russian", model: "mistral:latest", tagOnly: false });
    expect(log.info).toHaveBeenCalledWith("Dry-run: new tag would be: v0.1.0");
  });

  it("runs tag-only mode with the default patch bump", async () => {
    vi.mocked(runTagOnly).mockResolvedValueOnce({ kind: "tagged", tag: "v1.0.1" });
    await run("--tag");
    expect(runCommit).not.toHaveBeenCalled();
    expect(vi.mocked(runTagOnly).mock.calls[0]?.[0]).toMatchObject({ tagOnly: true, bump: "patch" });
    expect(log.ok).toHaveBeenCalledWith("New tag created: v1.0.1");
  });

  it("lets git failures propagate to the entry point", async () => {
    vi.mocked(runCommit).mockRejectedValueOnce(new Error("Command failed with exit code 1: git push"));
    await expect(run()).rejects.toThrow("git push");
  });
});
