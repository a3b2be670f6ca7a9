import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { ToolExecutor } from '../src/tools/executor';
import { ToolRegistry, defineTool } from '../src/tools/registry';

const registry = new ToolRegistry()
  .register(
    defineTool({
      name: 'nights',
      description: 'counts nights',
      inputSchema: z.object({ nights: z.number().int(), label: z.string().default('stay') }),
      execute: async ({ nights, label }) => `${label}: ${nights}`
    })
  )
  .register(
    defineTool({
      name: 'explode',
      description: 'always throws',
      inputSchema: z.object({}),
      execute: async () => {
        throw new Error('provider exploded');
      }
    })
  )
  .freeze();

const executor = new ToolExecutor(registry);

test('valid arguments are coerced with defaults and run', async () => {
  const res = await executor.execute({ id: '1', name: 'nights', args: { nights: 3 } });
  assert.deepEqual(res, { outcome: 'ok', content: 'stay: 3' });
});

test('unknown tool yields a text error', async () => {
  const res = await executor.execute({ id: '1', name: 'teleport', args: {} });
  assert.deepEqual(res, {
    outcome: 'unknown_tool',
    content: "Error: Tool 'teleport' not found or not correctly defined."
  });
});

test('schema violations list every issue', async () => {
  const res = await executor.execute({ id: '1', name: 'nights', args: { nights: 1.5, label: 7 } });
  assert.equal(res.outcome, 'invalid_args');
  assert.equal(
    res.content,
    `Error: Validation failed for tool 'nights' with args {"nights":1.5,"label":7}: nights: Expected integer, received float; label: Expected string, received number. The arguments were invalid.`
  );
});

test('adapter exceptions are converted to text', async () => {
  const res = await executor.execute({ id: '1', name: 'explode', args: {} });
  assert.deepEqual(res, { outcome: 'failed', content: "Error: Tool 'explode' failed with args {}: provider exploded" });
});
