import test from 'node:test';
import assert from 'node:assert/strict';
import { AgentLoop, NO_TOOL_CALLS_MESSAGE, shouldContinue, stepLimitMessage } from '../src/core/agent-loop';
import { Conversation, MISSING_CALL_ID } from '../src/core/conversation';
import { ModelCallError } from '../src/core/errors';
import { State } from '../src/core/fsm';
import { assistantMessage, toolMessage, userMessage, type Message } from '../src/core/messages';
import { createToolRegistry } from '../src/tools/builtins';
import { ScriptedModel, fakeFetch, testConfig } from './helpers';

function buildLoop(model: ScriptedModel, opts: { maxSteps?: number; fetch?: ReturnType<typeof fakeFetch> } = {}) {
  const registry = createToolRegistry(testConfig(), { fetch: (opts.fetch ?? fakeFetch()).fetch });
  return new AgentLoop(model, registry, { systemPrompt: 'You plan trips.', maxSteps: opts.maxSteps ?? 10 });
}

function toolResults(messages: readonly Message[]) {
  return messages.flatMap((m) => (m.role === 'tool' ? [{ id: m.toolCallId, content: m.content }] : []));
}

test('shouldContinue routes on the newest message', () => {
  assert.equal(shouldContinue(assistantMessage('', [{ id: 'c1', name: 'x', args: {} }])), 'tool');
  assert.equal(shouldContinue(toolMessage('c1', 'Error: bad input')), 'model');
  assert.equal(shouldContinue(toolMessage('c1', 'fine')), 'model');
  assert.equal(shouldContinue(assistantMessage('All set')), 'end');
  assert.equal(shouldContinue(userMessage('hello')), 'end');
});

test('runs tools in order and finishes on a text answer', async () => {
  const provider = fakeFetch({ body: { result: 'success', conversion_rate: 0.9 } });
  const model = new ScriptedModel([
    assistantMessage('Let me price this.', [
      { id: 'call_1', name: 'calculate_hotel_cost', args: { price_per_night: 150, num_nights: 7, currency: 'EUR' } },
      { id: 'call_2', name: 'convert_currency', args: { amount: 100, from_currency: 'USD', to_currency: 'EUR' } }
    ]),
    assistantMessage('Here is your plan.')
  ]);
  const loop = buildLoop(model, { fetch: provider });

  const result = await loop.run('A week in Paris');
  const messages = result.conversation.messages;

  assert.deepEqual(
    messages.map((m) => m.role),
    ['system', 'user', 'assistant', 'tool', 'tool', 'assistant']
  );
  assert.deepEqual(toolResults(messages), [
    { id: 'call_1', content: 'Total cost for hotel stay: 1050.00 EUR' },
    { id: 'call_2', content: '100.00 USD is equal to 90.00 EUR (Rate: 1 USD = 0.9000 EUR)' }
  ]);
  assert.deepEqual(provider.urls, ['http://fx.test/v6/test-fx-key/pair/USD/EUR']);
  assert.equal(result.steps, 2);
  assert.equal(result.stepLimitReached, false);
  assert.deepEqual(result.states, [State.AWAITING_MODEL, State.AWAITING_TOOL, State.AWAITING_MODEL, State.DONE]);
  assert.equal(model.seen[0].length, 2);
  assert.equal(model.seen[1].length, 5);
  assert.equal(model.seen[0][0].content, 'You plan trips.');
});

test('advertises all nine tools to the model', async () => {
  const model = new ScriptedModel([assistantMessage('ok')]);
  await buildLoop(model).run('hi');
  assert.deepEqual([...model.toolNames[0]].sort(), [
    'calculate_daily_budget',
    'calculate_hotel_cost',
    'calculate_total_cost',
    'convert_currency',
    'get_current_weather',
    'get_weather_forecast',
    'search_accommodations',
    'search_places_of_interest',
    'search_restaurants'
  ]);
});

test('unknown tools and bad arguments are reported back, not thrown', async () => {
  const model = new ScriptedModel([
    assistantMessage('', [
      { id: 'a', name: 'book_flight', args: { to: 'Rome' } },
      { id: 'b', name: 'calculate_daily_budget', args: { total_budget: 'lots', num_days: 3, currency: 'USD' } },
      { id: 'c', name: 'calculate_daily_budget', args: { total_budget: 500, num_days: 0, currency: 'USD' } }
    ]),
    assistantMessage('Sorry, I fixed it.')
  ]);

  const result = await buildLoop(model).run('budget please');
  const [unknown, invalid, zeroDays] = toolResults(result.conversation.messages);

  assert.deepEqual(unknown, { id: 'a', content: "Error: Tool 'book_flight' not found or not correctly defined." });
  assert.equal(invalid.id, 'b');
  assert.equal(
    invalid.content,
    `Error: Validation failed for tool 'calculate_daily_budget' with args {"total_budget":"lots","num_days":3,"currency":"USD"}: total_budget: Expected number, received string. The arguments were invalid.`
  );
  assert.deepEqual(zeroDays, { id: 'c', content: "Error: 'num_days' must be a positive integer." });
  assert.equal(result.conversation.last().content, 'Sorry, I fixed it.');
  assert.equal(result.steps, 2);
});

test('every tool result answers a call of the assistant turn just before it', async () => {
  const model = new ScriptedModel([
    assistantMessage('', [{ id: 't1', name: 'calculate_total_cost', args: { item_costs: [1, 2], currency: 'USD' } }]),
    assistantMessage('', [
      { id: 't2', name: 'calculate_total_cost', args: { item_costs: [3], currency: 'USD' } },
      { id: 't3', name: 'calculate_hotel_cost', args: { price_per_night: 10, num_nights: 2, currency: 'USD' } }
    ]),
    assistantMessage('done')
  ]);
  const messages = (await buildLoop(model).run('sum it')).conversation.messages;

  let pending: string[] = [];
  for (const m of messages) {
    if (m.role === 'assistant') pending = m.toolCalls.map((c) => c.id);
    if (m.role === 'tool') {
      assert.ok(pending.includes(m.toolCallId), `unexpected result ${m.toolCallId}`);
      pending = pending.filter((id) => id !== m.toolCallId);
    }
  }
  assert.deepEqual(pending, []);
});

test('step ceiling forces completion with a diagnostic answer', async () => {
  const call = (id: string) =>
    assistantMessage('', [{ id, name: 'calculate_total_cost', args: { item_costs: [1], currency: 'USD' } }]);
  const model = new ScriptedModel([call('x1'), call('x2'), call('x3')]);

  const result = await buildLoop(model, { maxSteps: 2 }).run('loop forever');

  assert.equal(result.stepLimitReached, true);
  assert.equal(result.steps, 2);
  assert.equal(result.conversation.last().content, stepLimitMessage(2));
  assert.equal(model.seen.length, 2);
  assert.deepEqual(result.states, [
    State.AWAITING_MODEL,
    State.AWAITING_TOOL,
    State.AWAITING_MODEL,
    State.AWAITING_TOOL,
    State.AWAITING_MODEL,
    State.DONE
  ]);
});

test('an empty model reply ends the run without an answer', async () => {
  const model = new ScriptedModel([assistantMessage('')]);
  const result = await buildLoop(model).run('hello?');
  assert.equal(result.steps, 1);
  assert.equal(result.conversation.length, 3);
  assert.deepEqual(result.states, [State.AWAITING_MODEL, State.DONE]);
});

test('a tool turn without calls gets one synthesized error result', async () => {
  const loop = buildLoop(new ScriptedModel([]));
  const conv = new Conversation('sys', 'q');
  conv.append(assistantMessage(''));

  await loop.executeToolTurn(conv);

  const last = conv.last();
  assert.equal(last.role, 'tool');
  assert.equal(last.role === 'tool' ? last.toolCallId : '', MISSING_CALL_ID);
  assert.equal(last.content, NO_TOOL_CALLS_MESSAGE);
});

test('model failures propagate to the caller', async () => {
  const model = new ScriptedModel([new ModelCallError('language model call failed: 503')]);
  await assert.rejects(buildLoop(model).run('hi'), ModelCallError);
});
