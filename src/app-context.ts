import type { Config } from './config';
import { AgentLoop } from './core/agent-loop';
import { LLMClient, type ChatModel } from './llm/llm-base';
import { SYSTEM_PROMPT } from './llm/prompts';
import { createToolRegistry, type BuiltinDeps } from './tools/builtins';
import type { ToolRegistry } from './tools/registry';

/** Everything a request needs, built once at startup and shared read-only between requests. */
export interface AppContext {
  config: Config;
  registry: ToolRegistry;
  model: ChatModel;
  agent: AgentLoop;
}

export interface AppContextOverrides extends BuiltinDeps {
  model?: ChatModel;
  systemPrompt?: string;
}

export function createAppContext(config: Config, overrides: AppContextOverrides = {}): AppContext {
  const registry = createToolRegistry(config, { fetch: overrides.fetch, now: overrides.now });
  const model = overrides.model ?? new LLMClient(config);
  const agent = new AgentLoop(model, registry, {
    systemPrompt: overrides.systemPrompt ?? SYSTEM_PROMPT,
    maxSteps: config.maxAgentSteps
  });
  return { config, registry, model, agent };
}
