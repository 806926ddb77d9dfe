export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCallRequest {
  id: string;
  name: string;
  /** Parsed JSON arguments, or the raw string when it was not valid JSON. */
  arguments: unknown;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  /** Calls issued by an assistant turn. */
  toolCalls?: ToolCallRequest[];
  /** For role `tool`: the call this message answers. */
  toolCallId?: string;
  name?: string;
}

export interface EngineUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface EngineToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface EngineRequest {
  /** Full conversation so far; the engine keeps no state between requests. */
  messages: ChatMessage[];
  tools: EngineToolDefinition[];
  /** `none` asks for a final answer without further tool calls. */
  toolChoice: 'auto' | 'none';
}

export type EngineResponse =
  | { type: 'tool_calls'; calls: ToolCallRequest[]; text?: string; usage?: EngineUsage }
  | { type: 'answer'; text: string; usage?: EngineUsage };

/**
 * External reasoning capability. Failures after the engine's own retries are
 * reported as EngineUnreachableError or EngineProtocolError.
 */
export interface ReasoningEngine {
  /** Rate-limit category, normally the model name. */
  readonly category: string;
  respond(request: EngineRequest, signal?: AbortSignal): Promise<EngineResponse>;
}
