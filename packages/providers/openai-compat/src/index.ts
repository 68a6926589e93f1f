export {
  OpenAICompatibleProvider,
  normalizeBaseUrl,
  toWireMessages,
  type OpenAICompatibleConfig,
} from "./provider";
export { ThinkStripper } from "./think-stripper";
export { processSSEBuffer, type SSEEvent } from "./sse";
export { HttpStatusError, classifyError, classifyStatus, buildErrorHint } from "./errors";
export type { WireMessage, WireRequest, WireToolDef, WireChunk, WireChoice, WireDelta, WireToolCall } from "./wire";
