// Test fixture: oracle that returns pre-baked steps, bypassing prompting

import type {
  OracleStep,
  OracleStepOptions,
  ReasoningOracle,
  ToolDescriptor,
  Turn,
} from "../types";
import { CancelledError } from "../types/errors";

export type ScriptedStep = OracleStep | Error | "hang";

export interface OracleCall {
  readonly transcript: readonly Turn[];
  readonly catalog: readonly ToolDescriptor[];
  readonly options?: OracleStepOptions;
}

export class ScriptedOracle implements ReasoningOracle {
  readonly calls: OracleCall[] = [];
  private cursor = 0;

  constructor(
    private readonly steps: readonly ScriptedStep[],
    private readonly repeatLast = false,
  ) {}

  async nextStep(
    transcript: readonly Turn[],
    catalog: readonly ToolDescriptor[],
    options?: OracleStepOptions,
  ): Promise<OracleStep> {
    this.calls.push({ transcript, catalog, options });
    const step = this.steps[this.cursor] ?? (this.repeatLast ? this.steps.at(-1) : undefined);
    if (step === undefined) {
      throw new Error(`ScriptedOracle ran out of steps after ${this.cursor} call(s)`);
    }
    this.cursor++;

    if (step === "hang") {
      return new Promise<OracleStep>((_, reject) => {
        const signal = options?.signal;
        if (signal?.aborted) return reject(new CancelledError("Oracle call cancelled"));
        signal?.addEventListener("abort", () => reject(new CancelledError("Oracle call cancelled")), {
          once: true,
        });
      });
    }
    if (step instanceof Error) throw step;
    return step;
  }
}

/** Shorthand step builders. */
export const answer = (text: string): OracleStep => ({ kind: "final-answer", text });

let nextCallId = 0;
export const callTool = (name: string, args: Record<string, unknown> = {}): OracleStep => ({
  kind: "tool-request",
  request: { id: `call-${++nextCallId}`, name, args },
});
