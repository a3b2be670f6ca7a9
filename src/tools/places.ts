import { z } from 'zod';
import { defineTool } from './registry';
import { buildUrl, getJson, ProviderRequestError, type FetchLike, type ProviderResponse } from './http';

const PROVIDER = 'Google Places';
export const MAX_RADIUS_METERS = 50_000;
export const MAX_RESULTS = 5;
const SEPARATOR = '----------------------------------';

export const PlaceSearchInputSchema = z.object({
  search_string: z
    .string()
    .min(1)
    .describe(
      "A descriptive string for the search, combining what and where (e.g., 'Italian restaurants in Rome', " +
        "'famous museums in London', 'budget hotels in Paris')."
    ),
  radius: z.number().int().default(5000).describe('Search radius in meters (default 5000 meters = 5km). Max 50000.'),
  type_filter: z
    .string()
    .default('')
    .describe("Optional: specific Google Place type to filter results (e.g., 'restaurant', 'museum', 'lodging').")
});
export type PlaceSearchInput = z.infer<typeof PlaceSearchInputSchema>;

export type PlaceCategory = 'point_of_interest' | 'restaurant' | 'lodging';

const PlaceSchema = z.object({
  name: z.string().optional(),
  formatted_address: z.string().optional(),
  rating: z.number().optional(),
  price_level: z.number().int().optional()
});

const TextSearchResponseSchema = z.object({
  status: z.string(),
  results: z.array(PlaceSchema).default([]),
  error_message: z.string().optional()
});

export interface PlacesDeps {
  apiKey: string;
  baseUrl: string;
  fetch?: FetchLike;
}

function formatPlace(place: z.infer<typeof PlaceSchema>, index: number): string {
  const price = place.price_level && place.price_level > 0 ? '$'.repeat(place.price_level) : 'N/A';
  return [
    `  ${index + 1}. Name: ${place.name ?? 'N/A'}`,
    `     Address: ${place.formatted_address ?? 'N/A'}`,
    `     Rating: ${place.rating ?? 'N/A'}/5`,
    `     Price Level: ${price}`,
    SEPARATOR
  ].join('\n');
}

export function createPlaceSearch(deps: PlacesDeps) {
  return async function searchPlaces(input: PlaceSearchInput, category: PlaceCategory): Promise<string> {
    const query = input.search_string;
    const { radius } = input;
    if (radius > MAX_RADIUS_METERS) return 'Error: Maximum search radius allowed is 50,000 meters.';
    if (radius <= 0) return "Error: 'radius' must be a positive number of meters.";

    const type = input.type_filter || category;
    const url = buildUrl(`${deps.baseUrl}/textsearch/json`, { query, key: deps.apiKey, radius, type });

    let res: ProviderResponse;
    try {
      res = await getJson(PROVIDER, url, deps.fetch);
    } catch (err) {
      if (err instanceof ProviderRequestError) {
        return `Error: Network error while contacting ${PROVIDER}: ${err.message}. Check internet connection or API key setup.`;
      }
      throw err;
    }
    if (!res.ok) return `Error: ${PROVIDER} request failed with HTTP ${res.status}.`;

    const parsed = TextSearchResponseSchema.safeParse(res.body);
    if (!parsed.success) return `Error: Unexpected response from ${PROVIDER} for '${query}'.`;
    const data = parsed.data;

    if (data.status === 'ZERO_RESULTS' || (data.status === 'OK' && data.results.length === 0)) {
      return `No results found for '${query}' with type '${type}' within ${radius / 1000}km.`;
    }
    switch (data.status) {
      case 'OK':
        break;
      case 'REQUEST_DENIED':
        return `Error: Invalid API key or request denied by ${PROVIDER}: ${data.error_message ?? data.status}`;
      case 'OVER_QUERY_LIMIT':
        return `Error: Rate limit exceeded for ${PROVIDER}. Please try again later.`;
      default:
        return `Error from Google Places API: ${data.error_message ?? data.status}. Check API key or query.`;
    }

    const top = data.results.slice(0, MAX_RESULTS);
    const header = `Top ${top.length} results for '${query}' (category: ${type}):`;
    return [header, ...top.map(formatPlace)].join('\n').trim();
  };
}

export function createPlaceSearchTools(deps: PlacesDeps) {
  const search = createPlaceSearch(deps);
  return [
    defineTool({
      name: 'search_places_of_interest',
      description:
        'Searches for places of interest like attractions, landmarks, or general points of interest. Provides ' +
        "name, address, rating, and price level. Example search_string: 'best parks in New York', 'historical sites in Kyoto'.",
      inputSchema: PlaceSearchInputSchema,
      execute: (input) => search(input, 'point_of_interest')
    }),
    defineTool({
      name: 'search_restaurants',
      description:
        'Searches for restaurants based on cuisine, type, or specific names. Provides name, address, rating, and ' +
        "price level. Example search_string: 'Italian food in Rome', 'cafes with wifi in Berlin'.",
      inputSchema: PlaceSearchInputSchema,
      execute: (input) => search(input, 'restaurant')
    }),
    defineTool({
      name: 'search_accommodations',
      description:
        'Searches for hotels, hostels, or other lodging options. Provides name, address, and rating. ' +
        "Example search_string: 'boutique hotels in Paris', 'budget hostels in Berlin'.",
      inputSchema: PlaceSearchInputSchema,
      execute: (input) => search(input, 'lodging')
    })
  ];
}
