// src/commands/config.ts
import { Command } from "commander";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { log } from "../core/logger.js";
import { CONFIG_PATH, ConfigSchema, ensureProjectRoot } from "../core/root.js";
import { parseConfig } from "../services/config.js";

type ConfigOpts = {
  init?: boolean;
  set?: string[];
};

export const configCommand = new Command("config")
  .description(`View or edit ${CONFIG_PATH}`)
  .option("--init", "Write the default config if none exists")
  .option(
    "--set <path=value>",
    "Set a field (e.g., model=mistral:latest or fragment.lines=8)",
    (v: string, prev: string[] = []) => [...prev, v]
  )
  .action(async (opts: ConfigOpts) => {
    const root = await ensureProjectRoot(process.cwd());
    const cfgPath = path.join(root, CONFIG_PATH);

    if (opts.init) {
      if (fs.existsSync(cfgPath)) {
        log.info("Config already exists; leaving as-is.");
      } else {
        await fsp.mkdir(path.dirname(cfgPath), { recursive: true });
        await fsp.writeFile(cfgPath, yaml.dump(ConfigSchema.parse({})), "utf8");
        log.ok(`Created ${cfgPath}`);
      }
    }

    const obj: Record<string, unknown> = fs.existsSync(cfgPath)
      ? asRecord(yaml.load(await fsp.readFile(cfgPath, "utf8")))
      : {};

    if (opts.set?.length) {
      for (const pair of opts.set) {
        const idx = pair.indexOf("=");
        if (idx === -1) throw new Error(`Bad --set format: ${pair}. Use path=value.`);
        const key = pair.slice(0, idx).trim();
        const val = pair.slice(idx + 1).trim();
        setDeep(obj, key, parseSetValue(key, val));
      }

      parseConfig(obj, CONFIG_PATH);
      await fsp.mkdir(path.dirname(cfgPath), { recursive: true });
      await fsp.writeFile(cfgPath, yaml.dump(obj), "utf8");
      log.ok("Config updated.");
      return;
    }

    // Effective config, defaults included
    process.stdout.write(yaml.dump(parseConfig(obj, CONFIG_PATH)));
  });

/* ────────────────────────────────────────────────────────────────────────────
 * helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asRecord(v: unknown): Record<string, unknown> {
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new Error(`${CONFIG_PATH} must contain a YAML mapping.`);
  return v;
}

export function setDeep(obj: Record<string, unknown>, dotted: string, value: unknown) {
  const parts = dotted.split(".");
  const last = parts.pop();
  if (!last) throw new Error(`Bad config path: ${dotted}`);
  let cur = obj;
  for (const part of parts) {
    const next = cur[part];
    if (isRecord(next)) {
      cur = next;
    } else {
      const created: Record<string, unknown> = {};
      cur[part] = created;
      cur = created;
    }
  }
  cur[last] = value;
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  let cur = schema;
  while (cur instanceof z.ZodDefault || cur instanceof z.ZodOptional) {
    cur = cur instanceof z.ZodDefault ? cur.removeDefault() : cur.unwrap();
  }
  return cur;
}

/** Schema of a dotted config field, or undefined for unknown paths. */
export function fieldSchema(dotted: string): z.ZodTypeAny | undefined {
  let cur: z.ZodTypeAny = ConfigSchema;
  for (const part of dotted.split(".")) {
    const obj = unwrap(cur);
    if (!(obj instanceof z.ZodObject)) return undefined;
    const shape: z.ZodRawShape = obj.shape;
    const next = shape[part];
    if (!next) return undefined;
    cur = next;
  }
  return unwrap(cur);
}

/** Coerce `v` only where the target field is a number or a boolean. */
export function parseSetValue(dotted: string, v: string): string | number | boolean {
  const field = fieldSchema(dotted);
  if (field instanceof z.ZodNumber) {
    const n = Number(v);
    return v.trim() !== "" && !Number.isNaN(n) ? n : v;
  }
  if (field instanceof z.ZodBoolean) {
    if (v === "true") return true;
    if (v === "false") return false;
  }
  return v;
}
