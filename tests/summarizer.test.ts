import { describe, it, expect } from "vitest";
import { sanitizeFragment, summarizeChanges } from "../src/services/summarizer.js";
import { FakeGit } from "./helpers/fake-git.js";

const STAGED_DIFF = [
  "diff --git a/src/app.ts b/src/app.ts",
  "index 83db48f..bf269f4 100644",
  "--- a/src/app.ts",
  "+++ b/src/app.ts",
  "@@ -1,3 +1,3 @@",
  '-const x = "1";',
  '+const x = "2";'
].join("\n");

describe("sanitizeFragment", () => {
  it("keeps the first lines and only payload-safe characters", () => {
    const raw = 'say "hi"\n\techo $HOME; rm -rf /\nthird\nfourth';
    expect(sanitizeFragment(raw, 3)).toBe("say hi echo HOME rm -rf third");
  });

  it("keeps non-ASCII letters", () => {
    expect(sanitizeFragment("добавлен файл «README»", 1)).toBe("добавлен файл README");
  });
});

describe("summarizeChanges", () => {
  it("prefers the staged diff", async () => {
    const git = new FakeGit({
      staged: { diff: STAGED_DIFF, files: ["src/app.ts"] },
      unstaged: { diff: "diff --git a/other b/other", files: ["other"] }
    });
    const fragment = await summarizeChanges(git, { lines: 3 });
    expect(fragment).toEqual({
      source: "staged",
      files: ["src/app.ts"],
      raw: STAGED_DIFF,
      text: "diff --git asrcapp.ts bsrcapp.ts index 83db48f..bf269f4 100644 --- asrcapp.ts"
    });
  });

  it("falls back to the unstaged diff", async () => {
    const git = new FakeGit({
      unstaged: { diff: "diff --git a/README.md b/README.md", files: ["README.md"] },
      untracked: { "new.txt": "ignored" }
    });
    const fragment = await summarizeChanges(git, { lines: 5 });
    expect(fragment?.source).toBe("unstaged");
    expect(fragment?.files).toEqual(["README.md"]);
    expect(fragment?.text).toBe("diff --git aREADME.md bREADME.md");
  });

  it("concatenates untracked files with a header per file", async () => {
    const git = new FakeGit({
      untracked: { "notes.txt": "hello\nworld", "b.md": "# Title" }
    });
    const fragment = await summarizeChanges(git, { lines: 10 });
    expect(fragment?.source).toBe("untracked");
    expect(fragment?.files).toEqual(["notes.txt", "b.md"]);
    expect(fragment?.raw).toBe("New file: notes.txt\nhello\nworld\nNew file: b.md\n# Title\n");
    expect(fragment?.text).toBe("New file notes.txt hello world New file b.md Title");
  });

  it("stops reading untracked files once enough lines are collected", async () => {
    const git = new FakeGit({
      untracked: { "notes.txt": "hello\nworld", "big.bin": "x".repeat(1000) }
    });
    const fragment = await summarizeChanges(git, { lines: 3 });
    expect(fragment?.files).toEqual(["notes.txt", "big.bin"]);
    expect(fragment?.raw).toBe("New file: notes.txt\nhello\nworld\n");
    expect(git.reads).toEqual(["notes.txt"]);
  });

  it("keeps enough untracked content for a longer fallback fragment", async () => {
    const git = new FakeGit({ untracked: { "a.txt": "one", "b.txt": "two" } });
    const fragment = await summarizeChanges(git, { lines: 1, retryLines: 3 });
    expect(fragment?.raw).toBe("New file: a.txt\none\nNew file: b.txt\ntwo\n");
    expect(fragment?.text).toBe("New file a.txt");
  });

  it("skips untracked entries that are not regular files", async () => {
    const git = new FakeGit({ untracked: { "vendor/lib": null, "café.txt": "bonjour" } });
    const fragment = await summarizeChanges(git, { lines: 5 });
    expect(fragment?.raw).toBe("New file: café.txt\nbonjour\n");
  });

  it("reports no changes when no untracked entry is readable", async () => {
    const git = new FakeGit({ untracked: { "vendor/lib": null } });
    expect(await summarizeChanges(git, { lines: 5 })).toBeNull();
  });

  it("returns null when there is nothing to commit", async () => {
    expect(await summarizeChanges(new FakeGit(), { lines: 5 })).toBeNull();
  });
});
