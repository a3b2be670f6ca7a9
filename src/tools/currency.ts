import { z } from 'zod';
import { defineTool } from './registry';
import { getJson, ProviderRequestError, type FetchLike, type ProviderResponse } from './http';

const PROVIDER = 'ExchangeRate-API';

export const CurrencyConversionInputSchema = z.object({
  amount: z.number().describe('The amount of money to convert.'),
  from_currency: z.string().describe("The currency code to convert from (e.g., 'USD', 'EUR', 'JPY')."),
  to_currency: z.string().describe("The currency code to convert to (e.g., 'GBP', 'CAD', 'INR').")
});
export type CurrencyConversionInput = z.infer<typeof CurrencyConversionInputSchema>;

const PairResponseSchema = z.union([
  z.object({ result: z.literal('success'), conversion_rate: z.number() }),
  z.object({ result: z.literal('error'), 'error-type': z.string().optional() })
]);

export interface CurrencyDeps {
  apiKey: string;
  baseUrl: string;
  fetch?: FetchLike;
}

const CODE = /^[A-Z]{3}$/;

export function createCurrencyConverter(deps: CurrencyDeps) {
  return async function convertCurrency(input: CurrencyConversionInput): Promise<string> {
    const { amount } = input;
    if (!(amount > 0)) return "Error: 'amount' must be a positive number.";

    const from = input.from_currency.toUpperCase();
    const to = input.to_currency.toUpperCase();
    if (!CODE.test(from)) {
      return `Error: Invalid 'from_currency' code '${from}'. Must be a 3-letter alphabetic code (e.g., 'USD').`;
    }
    if (!CODE.test(to)) {
      return `Error: Invalid 'to_currency' code '${to}'. Must be a 3-letter alphabetic code (e.g., 'EUR').`;
    }

    const url = `${deps.baseUrl}/${encodeURIComponent(deps.apiKey)}/pair/${from}/${to}`;
    let res: ProviderResponse;
    try {
      res = await getJson(PROVIDER, url, deps.fetch);
    } catch (err) {
      if (err instanceof ProviderRequestError) {
        return `Error: Network error while contacting ${PROVIDER}: ${err.message}. Check internet connection or API key.`;
      }
      throw err;
    }

    const parsed = PairResponseSchema.safeParse(res.body);
    const data = parsed.success ? parsed.data : undefined;
    if (data && data.result === 'error') {
      const errorType = data['error-type'] ?? 'unknown error';
      switch (errorType) {
        case 'unsupported-code':
          return `Error: One or both currency codes ('${from}', '${to}') are unsupported by the API. Check valid ISO codes.`;
        case 'invalid-key':
        case 'inactive-account':
          return `Error: Invalid API key for ${PROVIDER}. Please check your configuration.`;
        case 'quota-reached':
          return `Error: Rate limit reached for ${PROVIDER}. Please try again later.`;
        default:
          return `Error converting currency: ${errorType}.`;
      }
    }
    if (res.status === 404) {
      return `Error: Could not find exchange rate for '${from}' to '${to}'. One or both currency codes might be unsupported or incorrect. HTTP 404 Not Found.`;
    }
    if (res.status === 429) {
      return `Error: Rate limit reached for ${PROVIDER}. Please try again later.`;
    }
    if (!res.ok) {
      return `Error: ${PROVIDER} request failed with HTTP ${res.status}. Check internet connection or API key.`;
    }
    if (!data || data.result !== 'success') {
      return `Error: Unexpected response from ${PROVIDER} for '${from}' to '${to}'.`;
    }

    const rate = data.conversion_rate;
    return `${amount.toFixed(2)} ${from} is equal to ${(amount * rate).toFixed(2)} ${to} (Rate: 1 ${from} = ${rate.toFixed(4)} ${to})`;
  };
}

export function createConvertCurrencyTool(deps: CurrencyDeps) {
  return defineTool({
    name: 'convert_currency',
    description:
      'Converts a given amount from one currency to another using real-time exchange rates. Useful for ' +
      "budgeting international trips. Requires 'amount' (number), 'from_currency' (3-letter code, e.g., 'USD'), " +
      "and 'to_currency' (3-letter code, e.g., 'EUR').",
    inputSchema: CurrencyConversionInputSchema,
    execute: createCurrencyConverter(deps)
  });
}
