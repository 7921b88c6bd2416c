// tests/preflight.test.ts
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const state = vi.hoisted(() => ({ fail: false }));
vi.mock("execa", () => ({
  execa: vi.fn(async () => {
    if (state.fail) throw new Error("spawn git ENOENT");
    return { stdout: "git version 2.45.1\n" };
  })
}));

import { ConfigSchema } from "../src/core/root.js";
import { resolveRunConfig } from "../src/services/config.js";
import { checkTools, installHint, versionSafe } from "../src/services/preflight.js";

let dir = "";

beforeEach(() => {
  state.fail = false;
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "git-ai-commit-doctor-"));
});

afterEach(() => {
  vi.unstubAllGlobals();
  fs.rmSync(dir, { recursive: true, force: true });
});

function config() {
  return resolveRunConfig({ cwd: dir, file: ConfigSchema.parse({}), flags: {}, env: {} });
}

describe("preflight", () => {
  it("versionSafe returns null on a missing binary", async () => {
    state.fail = true;
    await expect(versionSafe("git")).resolves.toBeNull();
  });

  it("versionSafe trims the version output", async () => {
    await expect(versionSafe("git")).resolves.toBe("git version 2.45.1");
  });

  it("stops after the server check when Ollama is down", async () => {
    fs.mkdirSync(path.join(dir, ".git"));
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));

    const results = await checkTools(config());
    expect(results.map(r => [r.name, r.ok])).toEqual([
      ["git", true],
      ["repository", true],
      [path.join(".aicommit", "config.yml"), false],
      ["ollama", false]
    ]);
  });

  it("checks the configured model when the server is up", async () => {
    fs.mkdirSync(path.join(dir, ".git"));
    vi.stubGlobal("fetch", vi.fn(async (url: string) =>
      url.endsWith("/api/tags") ? Response.json({ models: [{ name: "mistral:latest" }] }) : new Response("ok")
    ));

    const results = await checkTools(config());
    expect(results.at(-1)).toEqual({
      name: "model llama3:latest",
      ok: false,
      required: false,
      message: "Not loaded in Ollama"
    });
  });

  it("flags a directory outside any repository as a required failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("ok")));
    const results = await checkTools(config());
    const repo = results.find(r => r.name === "repository");
    expect(repo?.ok).toBe(false);
    expect(repo?.required).toBe(true);
  });

  it("suggests pulling a missing model", () => {
    expect(installHint("model llama3:latest")).toBe("ollama pull llama3:latest");
  });
});
