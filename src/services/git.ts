import { execa } from "execa";
import fsp from "node:fs/promises";
import path from "node:path";

/** Everything the commit and tag flows need from git. */
export interface GitClient {
  diff(opts?: { staged?: boolean }): Promise<string>;
  diffFiles(opts?: { staged?: boolean }): Promise<string[]>;
  untrackedFiles(): Promise<string[]>;
  /** Up to `maxBytes` of a working-tree file; null when it is not a regular file. */
  readWorkingFile(file: string, maxBytes: number): Promise<string | null>;
  addAll(): Promise<void>;
  commit(message: string): Promise<void>;
  push(): Promise<void>;
  fetchTags(remote: string): Promise<void>;
  listTags(): Promise<string[]>;
  createTag(tag: string): Promise<void>;
  pushTag(remote: string, tag: string): Promise<void>;
}

function lines(out: string): string[] {
  return out.split("\n").map(s => s.trim()).filter(Boolean);
}

// `-z` output: paths verbatim, no core.quotePath escaping
function paths(out: string): string[] {
  return out.split("\0").filter(Boolean);
}

export class Git implements GitClient {
  constructor(private readonly cwd: string) {}

  private async sh(args: string[]) {
    await execa("git", args, { cwd: this.cwd, stdio: "inherit" });
  }

  private async shOut(args: string[], opts: { trim?: boolean } = {}) {
    const res = await execa("git", args, { cwd: this.cwd, stdio: ["ignore", "pipe", "inherit"] });
    const out: string = typeof res.stdout === "string" ? res.stdout : "";
    return opts.trim === false ? out : out.trim();
  }

  diff(opts: { staged?: boolean } = {}) {
    return this.shOut(opts.staged ? ["diff", "--cached"] : ["diff"]);
  }

  async diffFiles(opts: { staged?: boolean } = {}) {
    const args = opts.staged ? ["diff", "--cached", "--name-only", "-z"] : ["diff", "--name-only", "-z"];
    return paths(await this.shOut(args, { trim: false }));
  }

  async untrackedFiles() {
    const out = await this.shOut(["ls-files", "-z", "--others", "--exclude-standard"], { trim: false });
    // Nested repositories are listed as `dir/`
    return paths(out).filter(p => !p.endsWith("/"));
  }

  async readWorkingFile(file: string, maxBytes: number) {
    const full = path.join(this.cwd, file);
    const stat = await fsp.stat(full);
    if (!stat.isFile()) return null;
    const fh = await fsp.open(full, "r");
    try {
      const buf = Buffer.alloc(Math.min(maxBytes, stat.size));
      const { bytesRead } = await fh.read(buf, 0, buf.length, 0);
      return buf.subarray(0, bytesRead).toString("utf-8");
    } finally {
      await fh.close();
    }
  }

  addAll() {
    return this.sh(["add", "-A"]);
  }

  commit(message: string) {
    return this.sh(["commit", "-m", message]);
  }

  push() {
    return this.sh(["push"]);
  }

  fetchTags(remote: string) {
    return this.sh(["fetch", remote, "--tags"]);
  }

  async listTags() {
    return lines(await this.shOut(["tag", "--sort=-v:refname"]));
  }

  createTag(tag: string) {
    return this.sh(["tag", tag]);
  }

  pushTag(remote: string, tag: string) {
    return this.sh(["push", remote, `refs/tags/${tag}`]);
  }
}
