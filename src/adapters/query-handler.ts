import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../app-context';
import { errorMessage } from '../core/errors';
import { containsErrorMarker, describeMessage, isFinalAnswer, type Message } from '../core/messages';
import { logger } from '../observability/logger';

export const NO_FINAL_RESPONSE = 'No clear final response from AI.';

type QueryBody = { question: string };

const queryBodySchema = {
  type: 'object',
  required: ['question'],
  additionalProperties: false,
  properties: {
    question: { type: 'string', minLength: 1, pattern: '\\S' }
  }
} as const;

/**
 * Picks the user-facing answer: the newest assistant text with no pending calls,
 * or a wrapped tool error if one comes first when scanning from the end.
 */
export function extractAnswer(messages: readonly Message[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const msg = messages[i];
    if (isFinalAnswer(msg)) return msg.content;
    if (containsErrorMarker(msg)) {
      return `An error occurred during planning: ${msg.content}. Please try again.`;
    }
  }

  const state = messages.length > 0 ? describeMessage(messages[messages.length - 1]) : NO_FINAL_RESPONSE;
  return (
    'The AI agent processed your request but could not formulate a clear, final answer in the expected format. ' +
    `Last known internal message state: ${state}. ` +
    'This might indicate an ongoing thought process or an issue with final output generation. ' +
    'Please try rephrasing your request, or review backend logs for more details.'
  );
}

export async function answerQuestion(ctx: AppContext, question: string): Promise<string> {
  const result = await ctx.agent.run(question);
  return extractAnswer(result.conversation.messages);
}

export function registerQueryRoutes(server: FastifyInstance, ctx: AppContext) {
  server.post<{ Body: QueryBody }>('/query', { schema: { body: queryBodySchema } }, async (req, reply) => {
    const { question } = req.body;
    logger.info('query received', { reqId: req.id, question: question.slice(0, 80) });
    try {
      const answer = await answerQuestion(ctx, question);
      logger.info('query answered', { reqId: req.id, chars: answer.length });
      return { answer };
    } catch (err) {
      logger.error('query failed', { reqId: req.id, error: errorMessage(err) });
      return reply.code(500).send({ detail: errorMessage(err) });
    }
  });

  server.get('/health', async () => ({ status: 'ok', tools: ctx.registry.size }));
}
