import type { ChatCompletionTool } from 'openai/resources/chat/completions';
import type { Config } from '../src/config';
import type { AssistantMessage, Message } from '../src/core/messages';
import type { ChatModel } from '../src/llm/llm-base';
import type { FetchLike } from '../src/tools/http';

export type FakeResponse = { status?: number; body?: unknown; raw?: string } | Error;

/** In-process stand-in for global fetch: replays canned responses and records every URL. */
export function fakeFetch(...responses: FakeResponse[]) {
  const urls: string[] = [];
  const queue = [...responses];
  const fetch: FetchLike = async (url) => {
    urls.push(url);
    const next = queue.shift();
    if (!next) throw new Error(`unexpected request to ${url}`);
    if (next instanceof Error) throw next;
    const status = next.status ?? 200;
    const text = next.raw ?? (next.body === undefined ? '' : JSON.stringify(next.body));
    return { status, ok: status >= 200 && status < 300, text: async () => text };
  };
  return { fetch, urls };
}

/** Chat model that answers from a script and keeps a copy of what it was shown. */
export class ScriptedModel implements ChatModel {
  readonly seen: Message[][] = [];
  readonly toolNames: string[][] = [];
  private replies: Array<AssistantMessage | Error>;

  constructor(replies: Array<AssistantMessage | Error>) {
    this.replies = [...replies];
  }

  async complete(messages: readonly Message[], tools: ChatCompletionTool[]): Promise<AssistantMessage> {
    this.seen.push([...messages]);
    this.toolNames.push(tools.map((t) => t.function.name));
    const next = this.replies.shift();
    if (!next) throw new Error('scripted model ran out of replies');
    if (next instanceof Error) throw next;
    return next;
  }
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    openaiApiKey: 'test-openai-key',
    openaiModel: 'test-model',
    temperature: 0.7,
    maxAgentSteps: 10,
    openWeatherMapApiKey: 'test-weather-key',
    googlePlacesApiKey: 'test-places-key',
    exchangeRateApiKey: 'test-fx-key',
    weatherBaseUrl: 'http://weather.test/data/2.5',
    placesBaseUrl: 'http://places.test/place',
    exchangeRateBaseUrl: 'http://fx.test/v6',
    host: '127.0.0.1',
    port: 0,
    ...overrides
  };
}
