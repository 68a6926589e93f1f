// Test fixture: provider that plays back a script of canned replies

import type { Message, Provider, ProviderChunk, ProviderOptions } from "../types";

export type ScriptedReply =
  | { readonly text: string }
  | {
      readonly toolCalls: ReadonlyArray<{
        readonly name: string;
        readonly args?: Record<string, unknown>;
        readonly id?: string;
        readonly argsError?: string;
      }>;
    }
  | { readonly error: Error }
  /** Never answers; ends quietly once the request signal fires. */
  | { readonly hang: true };

export interface ScriptedCall {
  readonly messages: Message[];
  readonly options?: ProviderOptions;
}

export class ScriptedProvider implements Provider {
  readonly name = "scripted";
  readonly model = "scripted-model";
  readonly calls: ScriptedCall[] = [];
  private cursor = 0;

  /**
   * @param repeatLast keep returning the final reply once the script is exhausted
   */
  constructor(
    private readonly script: readonly ScriptedReply[],
    private readonly repeatLast = false,
  ) {}

  async *chat(messages: Message[], options?: ProviderOptions): AsyncIterable<ProviderChunk> {
    this.calls.push({ messages: [...messages], options });
    const reply = this.next();

    if ("error" in reply) throw reply.error;

    if ("hang" in reply) {
      await new Promise<void>((resolve) => {
        if (options?.signal?.aborted) return resolve();
        options?.signal?.addEventListener("abort", () => resolve(), { once: true });
      });
      return;
    }

    if ("text" in reply) {
      for (const piece of reply.text.match(/\S+\s*|\s+/g) ?? []) {
        yield { type: "text", text: piece };
      }
    } else {
      for (const [i, call] of reply.toolCalls.entries()) {
        yield {
          type: "tool_call",
          toolCall: {
            id: call.id ?? `scripted-call-${this.calls.length}-${i}`,
            name: call.name,
            args: call.args ?? {},
            ...(call.argsError !== undefined && { argsError: call.argsError }),
          },
        };
      }
    }
    yield { type: "usage", usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 } };
  }

  /** Messages of the most recent call. */
  lastCall(): Message[] | undefined {
    return this.calls.at(-1)?.messages;
  }

  private next(): ScriptedReply {
    const reply = this.script[this.cursor] ?? (this.repeatLast ? this.script.at(-1) : undefined);
    if (!reply) {
      throw new Error(`ScriptedProvider ran out of replies after ${this.cursor} call(s)`);
    }
    this.cursor++;
    return reply;
  }
}
