import { z } from 'zod';
import { defineTool } from './registry';
import { buildUrl, getJson, ProviderRequestError, type FetchLike, type ProviderResponse } from './http';

const PROVIDER = 'OpenWeatherMap';
export const FORECAST_DAYS = 5;
const SEPARATOR = '----------------------------------';

export const CurrentWeatherInputSchema = z.object({
  location: z.string().min(1).describe("The city or location to get current weather for (e.g., 'London, UK')")
});
export type CurrentWeatherInput = z.infer<typeof CurrentWeatherInputSchema>;

export const WeatherForecastInputSchema = z.object({
  location: z.string().min(1).describe("The city or location to get the 5-day weather forecast for (e.g., 'Paris')")
});
export type WeatherForecastInput = z.infer<typeof WeatherForecastInputSchema>;

const ConditionSchema = z.object({ description: z.string() });

const CurrentWeatherSchema = z.object({
  main: z.object({ temp: z.number(), feels_like: z.number(), humidity: z.number() }),
  weather: z.array(ConditionSchema).min(1),
  wind: z.object({ speed: z.number() })
});

const ForecastSchema = z.object({
  list: z.array(
    z.object({
      dt_txt: z.string(),
      main: z.object({ temp: z.number() }),
      weather: z.array(ConditionSchema)
    })
  )
});

const ErrorBodySchema = z.object({
  cod: z.union([z.string(), z.number()]).optional(),
  message: z.string().optional()
});

export interface WeatherDeps {
  apiKey: string;
  baseUrl: string;
  fetch?: FetchLike;
  // source of "today" for forecast filtering
  now?: () => Date;
}

export function capitalize(text: string): string {
  if (!text) return text;
  return text[0].toUpperCase() + text.slice(1).toLowerCase();
}

function localDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

type DaySummary = { min: number; max: number; descriptions: Set<string> };

/** Groups 3-hourly entries by calendar date and keeps the first `days` dates from `today` on. */
export function summarizeForecast(list: z.infer<typeof ForecastSchema>['list'], today: string, days = FORECAST_DAYS) {
  const byDate = new Map<string, DaySummary>();
  for (const item of list) {
    const date = item.dt_txt.split(' ')[0];
    const temp = item.main.temp;
    const day = byDate.get(date);
    if (!day) {
      byDate.set(date, { min: temp, max: temp, descriptions: new Set(item.weather.map((w) => w.description)) });
      continue;
    }
    day.min = Math.min(day.min, temp);
    day.max = Math.max(day.max, temp);
    for (const w of item.weather) day.descriptions.add(w.description);
  }
  return [...byDate.keys()]
    .sort()
    .filter((d) => d >= today)
    .slice(0, days)
    .map((date) => {
      const day = byDate.get(date) ?? { min: NaN, max: NaN, descriptions: new Set<string>() };
      return { date, min: day.min, max: day.max, conditions: [...day.descriptions].sort().join(', ') };
    });
}

export function createWeatherService(deps: WeatherDeps) {
  const now = deps.now ?? (() => new Date());

  async function fetchWeather(endpoint: 'weather' | 'forecast', location: string): Promise<ProviderResponse | string> {
    const url = buildUrl(`${deps.baseUrl}/${endpoint}`, { q: location, appid: deps.apiKey, units: 'metric' });
    try {
      return await getJson(PROVIDER, url, deps.fetch);
    } catch (err) {
      if (err instanceof ProviderRequestError) {
        return `Error: Network error while contacting ${PROVIDER} for ${location}: ${err.message}. Check your internet connection or API key.`;
      }
      throw err;
    }
  }

  function providerError(res: ProviderResponse, location: string, what: 'weather' | 'forecast'): string | null {
    const body = ErrorBodySchema.safeParse(res.body);
    const cod = body.success ? String(body.data.cod ?? res.status) : String(res.status);
    if (res.status === 404 || cod === '404') {
      const suffix = what === 'forecast' ? ' for forecast' : '';
      return `Error: Location '${location}' not found${suffix}. Please provide a valid city name.`;
    }
    if (res.status === 401 || cod === '401') return `Error: Invalid API key for ${PROVIDER}.`;
    if (res.status === 429 || cod === '429') return `Error: Rate limit exceeded for ${PROVIDER}. Please try again later.`;
    if (!res.ok || cod !== '200') {
      const message = body.success && body.data.message ? body.data.message : 'Unknown error from API';
      return `Error fetching ${what} for ${location}: ${message}`;
    }
    return null;
  }

  async function getCurrentWeather({ location }: CurrentWeatherInput): Promise<string> {
    const res = await fetchWeather('weather', location);
    if (typeof res === 'string') return res;
    const failure = providerError(res, location, 'weather');
    if (failure) return failure;

    const parsed = CurrentWeatherSchema.safeParse(res.body);
    if (!parsed.success) return `Error fetching weather for ${location}: Unexpected response from API`;
    const { main, weather, wind } = parsed.data;
    return [
      `Current weather in ${location}:`,
      `Temperature: ${main.temp}°C (Feels like: ${main.feels_like}°C)`,
      `Conditions: ${capitalize(weather[0].description)}`,
      `Humidity: ${main.humidity}%`,
      `Wind Speed: ${wind.speed} m/s`
    ].join('\n');
  }

  async function getWeatherForecast({ location }: WeatherForecastInput): Promise<string> {
    const res = await fetchWeather('forecast', location);
    if (typeof res === 'string') return res;
    const failure = providerError(res, location, 'forecast');
    if (failure) return failure;

    const parsed = ForecastSchema.safeParse(res.body);
    if (!parsed.success) return `Error fetching forecast for ${location}: Unexpected response from API`;

    const days = summarizeForecast(parsed.data.list, localDate(now()));
    if (days.length === 0) {
      return `Could not generate a valid forecast for ${location} for ${FORECAST_DAYS} days. It might be too far in the past or the API did not return enough data.`;
    }
    const blocks = days.map((d) =>
      [
        `  Date: ${d.date}`,
        `  Min Temp: ${d.min.toFixed(1)}°C, Max Temp: ${d.max.toFixed(1)}°C`,
        `  Conditions: ${capitalize(d.conditions)}`,
        SEPARATOR
      ].join('\n')
    );
    return [`Weather forecast for ${location} for ${FORECAST_DAYS} days:`, ...blocks].join('\n').trim();
  }

  return { getCurrentWeather, getWeatherForecast };
}

export function createWeatherTools(deps: WeatherDeps) {
  const service = createWeatherService(deps);
  return [
    defineTool({
      name: 'get_current_weather',
      description:
        'Fetches the current weather conditions for a specified city or location. Returns temperature, ' +
        'description, humidity, and wind speed. The location should be a city name, optionally followed by a ' +
        'country code (e.g., "London, UK").',
      inputSchema: CurrentWeatherInputSchema,
      execute: service.getCurrentWeather
    }),
    defineTool({
      name: 'get_weather_forecast',
      description:
        'Fetches the 5-day weather forecast for a specified city or location. Returns a summary of conditions ' +
        'for each day. The location should be a city name, optionally followed by a country code (e.g., "Paris").',
      inputSchema: WeatherForecastInputSchema,
      execute: service.getWeatherForecast
    })
  ];
}
