// Test fixtures shared with other packages via "@inventory-chat/core/fixtures"

export { ScriptedProvider, type ScriptedReply, type ScriptedCall } from "./__fixtures__/scripted-provider";
export {
  ScriptedOracle,
  answer,
  callTool,
  type ScriptedStep,
  type OracleCall,
} from "./__fixtures__/scripted-oracle";
export { lookupTool, pingTool } from "./__fixtures__/catalog";
export { recordingLogger, type LogRecord } from "./__fixtures__/recording-logger";
