import { z } from 'zod';
import { defaultSleep, type Sleep } from '../ratelimit/token-bucket.js';
import {
  CancelledError,
  EngineProtocolError,
  EngineUnreachableError,
  describeError,
} from '../errors.js';
import { logger } from '../utils/logger.js';
import type {
  ChatMessage,
  EngineRequest,
  EngineResponse,
  ReasoningEngine,
  ToolCallRequest,
} from './types.js';

const log = logger.child('engine');

export interface OpenAiCompatibleConfig {
  model: string;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  /** Additional attempts after the first for transient failures. */
  maxRetries?: number;
  temperature?: number;
  sleep?: Sleep;
}

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullish(),
      tool_calls: z.array(z.object({
        id: z.string(),
        type: z.string().optional(),
        function: z.object({
          name: z.string(),
          arguments: z.string().nullish(),
        }),
      })).nullish(),
    }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  }).nullish(),
});

type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

/** Thrown inside the retry loop for failures worth another attempt. */
class TransientFailure extends Error {}

const parseToolArgs = (raw: string | null | undefined): unknown => {
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
};

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? 'https://api.openai.com/v1';
  return root.endsWith('/') ? root : `${root}/`;
};

function toWireMessage(message: ChatMessage): Record<string, unknown> {
  const wire: Record<string, unknown> = { role: message.role, content: message.content };
  if (message.name) wire.name = message.name;
  if (message.toolCallId) wire.tool_call_id = message.toolCallId;
  if (message.toolCalls && message.toolCalls.length > 0) {
    wire.tool_calls = message.toolCalls.map(call => ({
      id: call.id,
      type: 'function',
      function: {
        name: call.name,
        arguments: typeof call.arguments === 'string' ? call.arguments : JSON.stringify(call.arguments ?? {}),
      },
    }));
  }
  return wire;
}

/**
 * Reasoning engine over any chat-completions endpoint that speaks the OpenAI
 * wire format (OpenAI, Gemini's compatibility layer, local gateways).
 */
export class OpenAiCompatibleEngine implements ReasoningEngine {
  readonly category: string;
  private readonly sleep: Sleep;

  constructor(private readonly config: OpenAiCompatibleConfig) {
    this.category = config.model;
    this.sleep = config.sleep ?? defaultSleep;
  }

  async respond(request: EngineRequest, signal?: AbortSignal): Promise<EngineResponse> {
    const url = new URL('chat/completions', normalizeBaseUrl(this.config.baseUrl)).toString();
    const body = JSON.stringify({
      model: this.config.model,
      messages: request.messages.map(toWireMessage),
      tools: request.tools.length > 0
        ? request.tools.map(tool => ({
          type: 'function',
          function: { name: tool.name, description: tool.description, parameters: tool.inputSchema },
        }))
        : undefined,
      tool_choice: request.tools.length > 0 ? request.toolChoice : undefined,
      temperature: this.config.temperature,
    });

    const maxRetries = this.config.maxRetries ?? 2;
    let lastFailure: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const backoffMs = Math.min(8000, 500 * 2 ** (attempt - 1));
        log.warn(`Retrying engine request (attempt ${attempt + 1}/${maxRetries + 1}) in ${backoffMs}ms: ${describeError(lastFailure)}`);
        await this.sleep(backoffMs, signal);
      }
      try {
        return toEngineResponse(await this.post(url, body, signal));
      } catch (error) {
        if (!(error instanceof TransientFailure)) throw error;
        lastFailure = error;
      }
    }

    throw new EngineUnreachableError(
      `Engine unreachable after ${maxRetries + 1} attempts: ${describeError(lastFailure)}`,
      { cause: lastFailure },
    );
  }

  private async post(url: string, body: string, signal?: AbortSignal): Promise<ChatCompletion> {
    if (signal?.aborted) throw new CancelledError();

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs ?? 60_000);

    try {
      let response: Response;
      try {
        response = await fetch(url, { method: 'POST', headers, body, signal: controller.signal });
      } catch (error) {
        if (signal?.aborted) throw new CancelledError();
        throw new TransientFailure(`request failed: ${describeError(error)}`, { cause: error });
      }

      if (!response.ok) {
        const errorBody = await response.text().catch(() => '');
        const detail = `HTTP ${response.status}: ${errorBody.slice(0, 500)}`;
        if (response.status === 429 || response.status >= 500) {
          throw new TransientFailure(detail);
        }
        throw new EngineProtocolError(`Engine rejected the request (${detail})`);
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        if (signal?.aborted) throw new CancelledError();
        throw new EngineProtocolError(`Engine returned invalid JSON: ${describeError(error)}`, { cause: error });
      }

      const parsed = ChatCompletionSchema.safeParse(payload);
      if (!parsed.success) {
        throw new EngineProtocolError(`Unexpected engine response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }
      return parsed.data;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function toEngineResponse(completion: ChatCompletion): EngineResponse {
  const message = completion.choices[0].message;
  const usage = completion.usage
    ? {
      inputTokens: completion.usage.prompt_tokens,
      outputTokens: completion.usage.completion_tokens,
      totalTokens: completion.usage.total_tokens,
    }
    : undefined;

  const calls: ToolCallRequest[] = (message.tool_calls ?? []).map(call => ({
    id: call.id,
    name: call.function.name,
    arguments: parseToolArgs(call.function.arguments),
  }));

  if (calls.length > 0) {
    return {
      type: 'tool_calls',
      calls,
      ...(message.content ? { text: message.content } : {}),
      ...(usage ? { usage } : {}),
    };
  }
  return { type: 'answer', text: message.content ?? '', ...(usage ? { usage } : {}) };
}
