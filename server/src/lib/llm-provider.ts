import type Anthropic from '@anthropic-ai/sdk';
import { createCombinedAbortSignal } from './abort.js';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  tools?: ToolDef[];
  tool_choice?: { type: 'any' } | { type: 'auto' } | { type: 'none' };
  max_tokens: number;
  temperature?: number;
  /** Ask for a bare JSON object (honoured by OpenAI-compatible backends). */
  json_mode?: boolean;
  signal?: AbortSignal;
}

/** Anthropic-style message with content blocks */
export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

export type ContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string };

export interface ToolDef {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface ChatResponse {
  text: string;
  tool_calls: ToolCall[];
  usage: { input_tokens: number; output_tokens: number };
}

export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

/** Hard ceiling for a single HTTP round-trip; callers usually pass a tighter signal. */
const REQUEST_TIMEOUT_MS = 180_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient();
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, REQUEST_TIMEOUT_MS);
    try {
      const request: Anthropic.MessageCreateParamsNonStreaming = {
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: params.messages.map(toAnthropicMessage),
      };
      if (params.temperature !== undefined) request.temperature = params.temperature;
      if (params.tools && params.tools.length > 0) {
        request.tools = params.tools.map((t): Anthropic.Tool => ({
          name: t.name,
          description: t.description,
          input_schema: { ...t.input_schema, type: 'object' },
        }));
        if (params.tool_choice && params.tool_choice.type !== 'none') {
          request.tool_choice = params.tool_choice;
        }
      }

      const response = await anthropic.messages.create(request, { signal });

      let text = '';
      const tool_calls: ToolCall[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          text += block.text;
        } else if (block.type === 'tool_use') {
          tool_calls.push({
            id: block.id,
            name: block.name,
            input: isRecord(block.input) ? block.input : {},
          });
        }
      }

      return {
        text,
        tool_calls,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } finally {
      cleanup();
    }
  }
}

type AnthropicBlockParam = Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam | Anthropic.ToolResultBlockParam;

export function toAnthropicMessage(msg: ChatMessage): Anthropic.MessageParam {
  if (typeof msg.content === 'string') {
    return { role: msg.role, content: msg.content };
  }
  const blocks = msg.content.map((block): AnthropicBlockParam => {
    switch (block.type) {
      case 'text':
        return { type: 'text', text: block.text };
      case 'tool_use':
        return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
      case 'tool_result':
        return { type: 'tool_result', tool_use_id: block.tool_use_id, content: block.content };
    }
  });
  return { role: msg.role, content: blocks };
}

// ─── OpenAI-compatible provider (Groq, OpenAI, local gateways) ──────

export interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai-compatible';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const body = this.buildRequestBody(params);
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, REQUEST_TIMEOUT_MS);
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        const err = new Error(`LLM API error ${response.status}: ${errText.slice(0, 500)}`);
        throw Object.assign(err, { status: response.status, headers: response.headers });
      }

      const data = await response.json() as OpenAIChatResponse;
      return this.parseResponse(data);
    } finally {
      cleanup();
    }
  }

  // ─── Translation helpers ─────────────────────────────────────────

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: this.translateMessages(params.system, params.messages),
    };

    if (params.temperature !== undefined) {
      body.temperature = params.temperature;
    }
    if (params.json_mode) {
      body.response_format = { type: 'json_object' };
    }

    if (params.tools && params.tools.length > 0) {
      body.tools = params.tools.map((t) => ({
        type: 'function',
        function: {
          name: t.name,
          description: t.description,
          parameters: t.input_schema,
        },
      }));
      if (params.tool_choice) {
        body.tool_choice = params.tool_choice.type === 'any' ? 'required' : params.tool_choice.type;
      }
    }

    return body;
  }

  /**
   * Anthropic-format messages → OpenAI-format messages. tool_use blocks on
   * assistant turns become tool_calls; tool_result blocks on user turns become
   * role 'tool' messages placed before any remaining user text.
   */
  private translateMessages(system: string, messages: ChatMessage[]): OpenAIMessage[] {
    const result: OpenAIMessage[] = [{ role: 'system', content: system }];

    for (const msg of messages) {
      if (typeof msg.content === 'string') {
        result.push({ role: msg.role, content: msg.content });
        continue;
      }

      if (msg.role === 'assistant') {
        let textContent = '';
        const toolCalls: OpenAIToolCall[] = [];
        for (const block of msg.content) {
          if (block.type === 'text') {
            textContent += block.text;
          } else if (block.type === 'tool_use') {
            toolCalls.push({
              id: block.id,
              type: 'function',
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            });
          }
        }
        const assistantMsg: OpenAIMessage = { role: 'assistant', content: textContent || null };
        if (toolCalls.length > 0) assistantMsg.tool_calls = toolCalls;
        result.push(assistantMsg);
        continue;
      }

      const textParts: string[] = [];
      for (const block of msg.content) {
        if (block.type === 'tool_result') {
          result.push({ role: 'tool', tool_call_id: block.tool_use_id, content: block.content });
        } else if (block.type === 'text') {
          textParts.push(block.text);
        }
      }
      if (textParts.length > 0) {
        result.push({ role: 'user', content: textParts.join('\n') });
      }
    }

    return result;
  }

  private parseResponse(data: OpenAIChatResponse): ChatResponse {
    const message = data.choices?.[0]?.message;
    const tool_calls: ToolCall[] = (message?.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      input: parseArguments(tc.function.arguments),
    }));

    return {
      text: message?.content ?? '',
      tool_calls,
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible wire types (internal) ─────────────────────────

interface OpenAIMessage {
  role: string;
  content?: string | null;
  tool_calls?: OpenAIToolCall[];
  tool_call_id?: string;
}

interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
      tool_calls?: OpenAIToolCall[];
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}
