import 'dotenv/config';
import { extractAnswer } from '../src/adapters/query-handler';
import { createAppContext } from '../src/app-context';
import { loadConfig } from '../src/config';
import { errorMessage } from '../src/core/errors';
import type { Message } from '../src/core/messages';

// Runs one travel request through the agent without the HTTP layer.
// usage: tsx scripts/plan.ts [--steps] "5 days in Lisbon on 1500 EUR"

function hasFlag(name: string): boolean {
  return process.argv.includes(`--${name}`);
}

function traceLine(msg: Message, index: number): string {
  const preview = (text: string) => (text.length > 160 ? `${text.slice(0, 160)}...` : text);
  switch (msg.role) {
    case 'assistant':
      if (msg.toolCalls.length > 0) {
        const calls = msg.toolCalls.map((c) => `${c.name}(${JSON.stringify(c.args)})`).join(', ');
        return `#${index} assistant -> ${calls}`;
      }
      return `#${index} assistant: ${preview(msg.content)}`;
    case 'tool':
      return `#${index} tool[${msg.toolCallId}]: ${preview(msg.content)}`;
    default:
      return `#${index} ${msg.role}: ${preview(msg.content)}`;
  }
}

async function main() {
  const question = process.argv
    .slice(2)
    .filter((arg) => !arg.startsWith('--'))
    .join(' ')
    .trim();
  if (!question) {
    console.error('usage: plan.ts [--steps] "<travel request>"');
    process.exit(1);
  }

  const ctx = createAppContext(loadConfig());
  const result = await ctx.agent.run(question);
  const messages = result.conversation.messages;

  if (hasFlag('steps')) {
    messages.forEach((m, i) => console.log(traceLine(m, i)));
    console.log(`--- ${result.steps} model calls${result.stepLimitReached ? ' (step limit reached)' : ''} ---\n`);
  }
  console.log(extractAnswer(messages));
}

main().catch((err) => {
  console.error(`plan failed: ${errorMessage(err)}`);
  process.exit(1);
});
