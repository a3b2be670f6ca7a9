import { ConversationError } from './errors';
import { systemMessage, userMessage, type AssistantMessage, type Message } from './messages';

export const MISSING_CALL_ID = 'error_no_call';

/**
 * Append-only message history for a single request.
 * Tool results must directly follow the assistant turn that requested them.
 */
export class Conversation {
  private history: Message[] = [];
  private answered = new Set<string>();

  constructor(systemPrompt: string, question: string) {
    this.history.push(systemMessage(systemPrompt), userMessage(question));
  }

  get length() {
    return this.history.length;
  }

  get messages(): readonly Message[] {
    return [...this.history];
  }

  last(): Message {
    return this.history[this.history.length - 1];
  }

  lastAssistant(): AssistantMessage | undefined {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const msg = this.history[i];
      if (msg.role === 'assistant') return msg;
    }
    return undefined;
  }

  append(msg: Message) {
    if (msg.role === 'system') {
      throw new ConversationError('system message can only open the conversation');
    }
    if (msg.role === 'assistant') {
      this.answered.clear();
    }
    if (msg.role === 'tool') {
      this.checkToolResult(msg.toolCallId);
    }
    this.history.push(msg);
  }

  private checkToolResult(id: string) {
    const prev = this.last();
    if (prev.role !== 'assistant' && prev.role !== 'tool') {
      throw new ConversationError(`tool result '${id}' does not follow an assistant turn`);
    }
    const turn = this.lastAssistant();
    if (!turn) {
      throw new ConversationError(`tool result '${id}' has no assistant turn to answer`);
    }
    if (turn.toolCalls.length === 0) {
      if (id === MISSING_CALL_ID && this.answered.size === 0) {
        this.answered.add(id);
        return;
      }
      throw new ConversationError(`tool result '${id}' answers a turn without tool calls`);
    }
    if (!turn.toolCalls.some((c) => c.id === id)) {
      throw new ConversationError(`tool result '${id}' matches no call in the preceding assistant turn`);
    }
    if (this.answered.has(id)) {
      throw new ConversationError(`tool call '${id}' was already answered`);
    }
    this.answered.add(id);
  }
}
