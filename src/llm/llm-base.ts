import OpenAI from 'openai';
import type {
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions';
import type { Config } from '../config';
import { ModelCallError, errorMessage } from '../core/errors';
import { assistantMessage, type AssistantMessage, type Message, type ToolCall } from '../core/messages';
import { logger } from '../observability/logger';

/** Anything that can turn a conversation plus a tool palette into the next assistant turn. */
export interface ChatModel {
  complete(messages: readonly Message[], tools: ChatCompletionTool[]): Promise<AssistantMessage>;
}

export type LLMSettings = Pick<Config, 'openaiApiKey' | 'openaiBaseUrl' | 'openaiModel' | 'temperature'>;

export function toOpenAIMessages(messages: readonly Message[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case 'system':
        return { role: 'system', content: m.content };
      case 'user':
        return { role: 'user', content: m.content };
      case 'tool':
        return { role: 'tool', tool_call_id: m.toolCallId, content: m.content };
      case 'assistant':
        if (m.toolCalls.length === 0) return { role: 'assistant', content: m.content };
        return {
          role: 'assistant',
          content: m.content || null,
          tool_calls: m.toolCalls.map((c) => ({
            id: c.id,
            type: 'function',
            function: { name: c.name, arguments: JSON.stringify(c.args) }
          }))
        };
    }
  });
}

function parseArguments(name: string, raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    logger.warn('tool call arguments are not an object', { tool: name, raw });
  } catch (err) {
    logger.warn('tool call arguments are not valid JSON', { tool: name, raw, error: errorMessage(err) });
  }
  return {};
}

// Some OpenAI-compatible hosts send blank or repeated call ids; tool results must answer a unique id.
function normalizeCallIds(rawIds: string[], names: string[]): string[] {
  const taken = new Set(rawIds);
  const used = new Set<string>();
  return rawIds.map((raw, index) => {
    if (raw && !used.has(raw)) {
      used.add(raw);
      return raw;
    }
    let id = `call_${index}`;
    for (let n = 1; taken.has(id) || used.has(id); n++) id = `call_${index}_${n}`;
    logger.warn('tool call id missing or repeated, assigned a new one', { tool: names[index], id: raw, replacement: id });
    used.add(id);
    return id;
  });
}

export function fromOpenAIMessage(msg: ChatCompletionMessage): AssistantMessage {
  const raw = msg.tool_calls ?? [];
  const ids = normalizeCallIds(
    raw.map((c) => c.id),
    raw.map((c) => c.function.name)
  );
  const calls: ToolCall[] = raw.map((c, index) => ({
    id: ids[index],
    name: c.function.name,
    args: parseArguments(c.function.name, c.function.arguments)
  }));
  return assistantMessage(msg.content ?? '', calls);
}

export function createOpenAIClient(settings: Pick<LLMSettings, 'openaiApiKey' | 'openaiBaseUrl'>): OpenAI {
  return new OpenAI({
    apiKey: settings.openaiApiKey,
    baseURL: settings.openaiBaseUrl,
    // a failed call surfaces as a request error, never retried
    maxRetries: 0
  });
}

export class LLMClient implements ChatModel {
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(settings: LLMSettings, client?: OpenAI) {
    this.client = client ?? createOpenAIClient(settings);
    this.model = settings.openaiModel;
    this.temperature = settings.temperature;
  }

  async complete(messages: readonly Message[], tools: ChatCompletionTool[]): Promise<AssistantMessage> {
    logger.debug('llm request', { model: this.model, messages: messages.length, tools: tools.length });
    let reply: ChatCompletionMessage | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        messages: toOpenAIMessages(messages),
        ...(tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {})
      });
      reply = response.choices[0]?.message;
    } catch (err) {
      throw new ModelCallError(`language model call failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!reply) {
      throw new ModelCallError('language model returned no choices');
    }
    const msg = fromOpenAIMessage(reply);
    logger.debug('llm reply', { chars: msg.content.length, toolCalls: msg.toolCalls.map((c) => c.name) });
    return msg;
  }
}
