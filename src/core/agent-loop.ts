import { randomUUID } from 'crypto';
import type { ChatCompletionTool } from 'openai/resources/chat/completions';
import type { ChatModel } from '../llm/llm-base';
import { ToolExecutor } from '../tools/executor';
import type { ToolRegistry } from '../tools/registry';
import { logger } from '../observability/logger';
import { Conversation, MISSING_CALL_ID } from './conversation';
import { FSM, State } from './fsm';
import {
  assistantMessage,
  containsErrorMarker,
  hasToolCalls,
  isFinalAnswer,
  toolMessage,
  type Message
} from './messages';

export type NextStep = 'tool' | 'model' | 'end';

export const NO_TOOL_CALLS_MESSAGE =
  "Error: Agent attempted to call a tool but no tool calls were found in the model's response.";

export function stepLimitMessage(steps: number) {
  return `I stopped after ${steps} planning steps without reaching a final answer. Please try a more specific request.`;
}

/** Routing decision taken on the newest message. */
export function shouldContinue(last: Message): NextStep {
  if (hasToolCalls(last)) return 'tool';
  if (last.role === 'tool') return 'model';
  return 'end';
}

export interface AgentLoopOptions {
  systemPrompt: string;
  // model calls allowed per run
  maxSteps: number;
}

export interface AgentRunResult {
  runId: string;
  conversation: Conversation;
  steps: number;
  stepLimitReached: boolean;
  states: State[];
}

export class AgentLoop {
  private executor: ToolExecutor;
  private tools: ChatCompletionTool[];

  constructor(
    private readonly model: ChatModel,
    registry: ToolRegistry,
    private readonly opts: AgentLoopOptions
  ) {
    this.executor = new ToolExecutor(registry);
    this.tools = registry.toOpenAITools();
  }

  async run(question: string, runId: string = randomUUID()): Promise<AgentRunResult> {
    const conversation = new Conversation(this.opts.systemPrompt, question);
    const fsm = new FSM();
    let steps = 0;
    let stepLimitReached = false;
    logger.info('agent run start', { runId, question: question.slice(0, 80) });

    while (!fsm.done) {
      if (fsm.state === State.AWAITING_TOOL) {
        await this.executeToolTurn(conversation, runId);
        const last = conversation.last();
        if (containsErrorMarker(last)) {
          logger.warn('tool reported an error; returning to model', { runId, content: last.content.slice(0, 200) });
        }
        fsm.transition(State.AWAITING_MODEL);
        continue;
      }

      if (steps >= this.opts.maxSteps) {
        logger.warn('agent step limit reached', { runId, steps });
        conversation.append(assistantMessage(stepLimitMessage(steps)));
        stepLimitReached = true;
        fsm.transition(State.DONE);
        break;
      }

      steps += 1;
      logger.info('agent calling model', { runId, step: steps, messages: conversation.length });
      const reply = await this.model.complete(conversation.messages, this.tools);
      conversation.append(reply);

      if (shouldContinue(reply) === 'tool') {
        logger.info('model requested tools', { runId, tools: reply.toolCalls.map((c) => c.name) });
        fsm.transition(State.AWAITING_TOOL);
      } else {
        if (!isFinalAnswer(reply)) {
          logger.warn('model returned neither text nor tool calls', { runId });
        } else {
          logger.info('model produced final answer', { runId, chars: reply.content.length });
        }
        fsm.transition(State.DONE);
      }
    }

    logger.info('agent run done', { runId, steps, messages: conversation.length, stepLimitReached });
    return { runId, conversation, steps, stepLimitReached, states: [...fsm.trail] };
  }

  /**
   * Answers every tool call of the latest assistant turn, in order, one at a time.
   * A turn without calls gets a single synthesized error result.
   */
  async executeToolTurn(conversation: Conversation, runId = '-') {
    const turn = conversation.lastAssistant();
    const calls = turn?.toolCalls ?? [];
    if (calls.length === 0) {
      logger.warn('tool turn has no tool calls', { runId });
      conversation.append(toolMessage(MISSING_CALL_ID, NO_TOOL_CALLS_MESSAGE));
      return;
    }
    for (const call of calls) {
      logger.info('executing tool', { runId, tool: call.name, args: call.args });
      const result = await this.executor.execute(call);
      conversation.append(toolMessage(call.id, result.content));
    }
  }
}
