/** Ollama is not running, or the requested model is not loaded. Not a failure of this tool. */
export class ServiceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ServiceUnavailableError";
  }
}

/**
 * The model could not produce a usable commit message: a non-200 answer,
 * or an empty message after the fallback prompt.
 */
export class GenerationFailedError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string
  ) {
    super(message);
    this.name = "GenerationFailedError";
  }
}
