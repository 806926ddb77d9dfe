export { OpenAiCompatibleEngine, type OpenAiCompatibleConfig } from './openai-compatible.js';
export type {
  ChatMessage,
  ChatRole,
  EngineRequest,
  EngineResponse,
  EngineToolDefinition,
  EngineUsage,
  ReasoningEngine,
  ToolCallRequest,
} from './types.js';
