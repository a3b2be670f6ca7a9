import { ConfigError } from './core/errors';

export type Config = {
  openaiApiKey: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  // sampling temperature for every planning turn
  temperature: number;
  // model round-trips allowed per request before the loop is forced to stop
  maxAgentSteps: number;
  openWeatherMapApiKey: string;
  googlePlacesApiKey: string;
  exchangeRateApiKey: string;
  weatherBaseUrl: string;
  placesBaseUrl: string;
  exchangeRateBaseUrl: string;
  host: string;
  port: number;
};

type Env = Record<string, string | undefined>;

const REQUIRED_KEYS = ['OPENAI_API_KEY', 'OPENWEATHERMAP_API_KEY', 'GPLACES_API_KEY', 'EXCHANGE_RATE_API_KEY'] as const;

function numberOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = Number(raw);
  return Number.isFinite(v) ? v : fallback;
}

function positiveIntOr(raw: string | undefined, fallback: number): number {
  const v = numberOr(raw, fallback);
  return Number.isInteger(v) && v > 0 ? v : fallback;
}

function required(env: Env, name: (typeof REQUIRED_KEYS)[number]): string {
  return env[name]?.trim() ?? '';
}

/**
 * Builds the process configuration from the environment.
 * Throws ConfigError naming every absent credential; callers treat that as fatal.
 */
export function loadConfig(env: Env = process.env): Config {
  const missing = REQUIRED_KEYS.filter((name) => !required(env, name));
  if (missing.length > 0) {
    throw new ConfigError([...missing]);
  }

  return {
    openaiApiKey: required(env, 'OPENAI_API_KEY'),
    openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
    openaiModel: env.OPENAI_MODEL ?? 'gpt-4.1-mini',
    temperature: numberOr(env.LLM_TEMPERATURE, 0.7),
    maxAgentSteps: positiveIntOr(env.MAX_AGENT_STEPS, 25),
    openWeatherMapApiKey: required(env, 'OPENWEATHERMAP_API_KEY'),
    googlePlacesApiKey: required(env, 'GPLACES_API_KEY'),
    exchangeRateApiKey: required(env, 'EXCHANGE_RATE_API_KEY'),
    weatherBaseUrl: env.WEATHER_BASE_URL ?? 'http://api.openweathermap.org/data/2.5',
    placesBaseUrl: env.PLACES_BASE_URL ?? 'https://maps.googleapis.com/maps/api/place',
    exchangeRateBaseUrl: env.EXCHANGE_RATE_BASE_URL ?? 'https://v6.exchangerate-api.com/v6',
    host: env.HOST ?? '0.0.0.0',
    port: positiveIntOr(env.PORT, 8000)
  };
}
