import type { Config } from '../config';
import { ToolRegistry } from './registry';
import type { FetchLike } from './http';
import { createWeatherTools } from './weather';
import { createPlaceSearchTools } from './places';
import { calculateDailyBudgetTool, calculateHotelCostTool, calculateTotalCostTool } from './expenses';
import { createConvertCurrencyTool } from './currency';

export type ProviderSettings = Pick<
  Config,
  | 'openWeatherMapApiKey'
  | 'googlePlacesApiKey'
  | 'exchangeRateApiKey'
  | 'weatherBaseUrl'
  | 'placesBaseUrl'
  | 'exchangeRateBaseUrl'
>;

export interface BuiltinDeps {
  fetch?: FetchLike;
  now?: () => Date;
}

/** The full nine-tool palette, frozen once built. */
export function createToolRegistry(settings: ProviderSettings, deps: BuiltinDeps = {}): ToolRegistry {
  const registry = new ToolRegistry();

  for (const tool of createWeatherTools({
    apiKey: settings.openWeatherMapApiKey,
    baseUrl: settings.weatherBaseUrl,
    fetch: deps.fetch,
    now: deps.now
  })) {
    registry.register(tool);
  }

  for (const tool of createPlaceSearchTools({
    apiKey: settings.googlePlacesApiKey,
    baseUrl: settings.placesBaseUrl,
    fetch: deps.fetch
  })) {
    registry.register(tool);
  }

  registry
    .register(calculateTotalCostTool)
    .register(calculateHotelCostTool)
    .register(calculateDailyBudgetTool)
    .register(
      createConvertCurrencyTool({
        apiKey: settings.exchangeRateApiKey,
        baseUrl: settings.exchangeRateBaseUrl,
        fetch: deps.fetch
      })
    );

  return registry.freeze();
}
