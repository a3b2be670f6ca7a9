import { ConversationError } from './errors';

export const ERROR_MARKER = 'Error:';

export interface ToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export interface SystemMessage {
  readonly role: 'system';
  readonly content: string;
}

export interface UserMessage {
  readonly role: 'user';
  readonly content: string;
}

export interface AssistantMessage {
  readonly role: 'assistant';
  readonly content: string;
  readonly toolCalls: readonly ToolCall[];
}

export interface ToolMessage {
  readonly role: 'tool';
  readonly toolCallId: string;
  readonly content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export function systemMessage(content: string): SystemMessage {
  if (!content.trim()) throw new ConversationError('system message must have content');
  return Object.freeze({ role: 'system', content });
}

export function userMessage(content: string): UserMessage {
  if (!content.trim()) throw new ConversationError('user message must have content');
  return Object.freeze({ role: 'user', content });
}

export function assistantMessage(content: string, toolCalls: ToolCall[] = []): AssistantMessage {
  const seen = new Set<string>();
  for (const call of toolCalls) {
    if (!call.id) throw new ConversationError(`tool call '${call.name}' has no id`);
    if (seen.has(call.id)) throw new ConversationError(`duplicate tool call id '${call.id}'`);
    seen.add(call.id);
  }
  const calls = toolCalls.map((c) => Object.freeze({ id: c.id, name: c.name, args: { ...c.args } }));
  return Object.freeze({ role: 'assistant', content, toolCalls: Object.freeze(calls) });
}

export function toolMessage(toolCallId: string, content: string): ToolMessage {
  if (!toolCallId) throw new ConversationError('tool message needs the id of the call it answers');
  return Object.freeze({ role: 'tool', toolCallId, content });
}

export function hasToolCalls(msg: Message): msg is AssistantMessage {
  return msg.role === 'assistant' && msg.toolCalls.length > 0;
}

export function isFinalAnswer(msg: Message): msg is AssistantMessage {
  return msg.role === 'assistant' && msg.toolCalls.length === 0 && msg.content.trim().length > 0;
}

export function containsErrorMarker(msg: Message): msg is ToolMessage {
  return msg.role === 'tool' && msg.content.includes(ERROR_MARKER);
}

/** One-line shape of a message, used when no usable answer was produced. */
export function describeMessage(msg: Message): string {
  const calls = msg.role === 'assistant' ? JSON.stringify(msg.toolCalls) : '[]';
  return `Type: ${msg.role}, Content: ${msg.content}, Tool Calls: ${calls}`;
}
