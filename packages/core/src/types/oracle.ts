// Reasoning oracle contract: one validated step per call

import type { ToolDescriptor, ToolInvocationRequest } from "./tool";
import type { Turn } from "./transcript";
import type { MalformedOracleResponseError } from "./errors";

export type OracleStep =
  | { readonly kind: "final-answer"; readonly text: string }
  | { readonly kind: "tool-request"; readonly request: ToolInvocationRequest };

export interface OracleStepOptions {
  readonly signal?: AbortSignal;
  /** The previous reply's rejection; the adapter re-prompts with a correction instruction. */
  readonly correction?: MalformedOracleResponseError;
}

/**
 * Stateless with respect to sessions; safe to share between concurrent loops.
 * Rejects with MalformedOracleResponseError, OracleUnavailableError or
 * CancelledError.
 */
export interface ReasoningOracle {
  nextStep(
    transcript: readonly Turn[],
    catalog: readonly ToolDescriptor[],
    options?: OracleStepOptions,
  ): Promise<OracleStep>;
}
