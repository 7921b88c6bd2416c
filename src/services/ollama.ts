// src/services/ollama.ts
import { z } from "zod";
import { ServiceUnavailableError } from "../core/errors.js";

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).default([])
});

const GenerateResponseSchema = z.object({
  response: z.string()
});

export type GenerateResult = {
  status: number;
  body: string;
  /** `response` field of a 200 answer; "" when the body is not the expected JSON. */
  text: string;
};

/** The part of the Ollama API the message generator talks to. */
export interface CompletionClient {
  generate(model: string, prompt: string): Promise<GenerateResult>;
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class OllamaClient implements CompletionClient {
  constructor(
    readonly baseUrl: string,
    private readonly connectTimeoutMs = 1000
  ) {}

  /** Bare GET on the server root with a short timeout. */
  async isReachable(): Promise<boolean> {
    try {
      const res = await fetch(this.baseUrl, { signal: AbortSignal.timeout(this.connectTimeoutMs) });
      await res.body?.cancel();
      return true;
    } catch {
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    let body: string;
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`);
      body = await res.text();
    } catch (e) {
      throw new ServiceUnavailableError(`Ollama server is not reachable at ${this.baseUrl}: ${describe(e)}`);
    }
    const parsed = TagsResponseSchema.safeParse(parseJson(body));
    return parsed.success ? parsed.data.models.map(m => m.name) : [];
  }

  /** Ollama names untagged models `<name>:latest`. */
  async hasModel(model: string): Promise<boolean> {
    const names = await this.listModels();
    const candidates = model.includes(":") ? [model] : [model, `${model}:latest`];
    return names.some(n => candidates.includes(n));
  }

  async generate(model: string, prompt: string): Promise<GenerateResult> {
    let status: number;
    let body: string;
    try {
      const res = await fetch(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model, prompt, stream: false })
      });
      status = res.status;
      body = await res.text();
    } catch (e) {
      throw new ServiceUnavailableError(`Ollama request failed at ${this.baseUrl}: ${describe(e)}`);
    }

    if (status !== 200) return { status, body, text: "" };
    const parsed = GenerateResponseSchema.safeParse(parseJson(body));
    return { status, body, text: parsed.success ? parsed.data.response : "" };
  }
}
