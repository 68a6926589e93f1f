// Abstract base class for LLM providers.
//
// Wraps the subclass's _chat() implementation so that every failure leaving
// a provider is a ProviderError with a normalized code, and notes streams
// that never reported token usage.

import type { Logger, Message, Provider, ProviderOptions, ProviderChunk } from "./types";
import { ProviderError } from "./types/errors";
import { silentLogger } from "./types/logger";

export abstract class AbstractProvider implements Provider {
  abstract readonly name: string;
  protected readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async *chat(messages: Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk> {
    let sawUsage = false;
    try {
      for await (const chunk of this._chat(messages, options)) {
        if (chunk.type === "usage") sawUsage = true;
        yield chunk;
      }
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`${this.name} error: ${message}`, "unknown", error);
    }
    if (!sawUsage && !options?.signal?.aborted) {
      this.logger.debug("Provider did not report token usage", { provider: this.name });
    }
  }

  protected abstract _chat(
    messages: Message[],
    options?: ProviderOptions,
  ): AsyncIterable<ProviderChunk>;
}
