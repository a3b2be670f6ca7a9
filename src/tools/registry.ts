import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ChatCompletionTool } from 'openai/resources/chat/completions';

/**
 * A single capability the model may invoke by name.
 * `inputSchema` is the source of truth for both validation and the advertised JSON Schema.
 */
export interface ToolDefinition<TInput> {
  name: string;
  description: string;
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  execute(input: TInput): Promise<string>;
}

export function defineTool<TInput>(def: ToolDefinition<TInput>): ToolDefinition<TInput> {
  return def;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function toJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const raw: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  if (!isRecord(raw)) return { type: 'object', properties: {} };
  const { $schema: _dialect, ...rest } = raw;
  return rest;
}

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition<unknown>>();
  private frozen = false;

  register<TInput>(def: ToolDefinition<TInput>) {
    if (this.frozen) throw new Error(`tool registry is frozen; cannot register '${def.name}'`);
    if (this.tools.has(def.name)) throw new Error(`tool '${def.name}' is already registered`);
    this.tools.set(def.name, def);
    return this;
  }

  freeze() {
    this.frozen = true;
    return this;
  }

  get isFrozen() {
    return this.frozen;
  }

  get(name: string): ToolDefinition<unknown> | undefined {
    return this.tools.get(name);
  }

  has(name: string) {
    return this.tools.has(name);
  }

  list(): ToolDefinition<unknown>[] {
    return [...this.tools.values()];
  }

  get size() {
    return this.tools.size;
  }

  toOpenAITools(): ChatCompletionTool[] {
    return this.list().map((def) => ({
      type: 'function',
      function: {
        name: def.name,
        description: def.description,
        parameters: toJsonSchema(def.inputSchema)
      }
    }));
  }
}
