import { z } from 'zod';
import { defineTool } from './registry';

// Arithmetic helpers for trip budgeting. No I/O.

const currency = z.string().min(1).describe("The currency of the amounts (e.g., 'USD', 'EUR', 'INR').");

export const TotalCostInputSchema = z.object({
  item_costs: z.array(z.number()).describe('A list of individual costs (numbers). E.g., [100.0, 50.5, 25.0]'),
  currency,
  description: z.string().default('various expenses').describe('A brief description for the total calculation.')
});
export type TotalCostInput = z.infer<typeof TotalCostInputSchema>;

export const HotelCostInputSchema = z.object({
  price_per_night: z.number().describe('The cost of the hotel per night.'),
  num_nights: z.number().int().describe('The number of nights for the stay.'),
  currency,
  description: z.string().default('hotel stay').describe('A brief description for the hotel cost.')
});
export type HotelCostInput = z.infer<typeof HotelCostInputSchema>;

export const DailyBudgetInputSchema = z.object({
  total_budget: z.number().describe('The total budget available for the trip or a period.'),
  num_days: z.number().int().describe('The number of days the budget needs to cover.'),
  currency,
  description: z.string().default('daily budget').describe('A brief description for the daily budget.')
});
export type DailyBudgetInput = z.infer<typeof DailyBudgetInputSchema>;

export function calculateTotalCost({ item_costs, currency, description }: TotalCostInput): string {
  if (item_costs.some((c) => c < 0)) {
    return "Error: 'item_costs' must not contain negative values.";
  }
  const total = item_costs.reduce((a, b) => a + b, 0);
  return `Total cost for ${description}: ${total.toFixed(2)} ${currency}`;
}

export function calculateHotelCost({ price_per_night, num_nights, currency, description }: HotelCostInput): string {
  if (!(price_per_night > 0)) return "Error: 'price_per_night' must be a positive number.";
  if (!Number.isInteger(num_nights) || num_nights <= 0) return "Error: 'num_nights' must be a positive integer.";
  return `Total cost for ${description}: ${(price_per_night * num_nights).toFixed(2)} ${currency}`;
}

export function calculateDailyBudget({ total_budget, num_days, currency, description }: DailyBudgetInput): string {
  if (!(total_budget > 0)) return "Error: 'total_budget' must be a positive number.";
  if (!Number.isInteger(num_days) || num_days <= 0) return "Error: 'num_days' must be a positive integer.";
  return `Daily budget for ${description}: ${(total_budget / num_days).toFixed(2)} ${currency}`;
}

export const calculateTotalCostTool = defineTool({
  name: 'calculate_total_cost',
  description:
    'Calculates the sum of a list of individual costs. Useful for summing up various trip expenses like ' +
    "activities, food, or miscellaneous items. Requires 'item_costs' (list of numbers), 'currency' " +
    "(e.g., 'USD'), and an optional 'description'.",
  inputSchema: TotalCostInputSchema,
  execute: async (input) => calculateTotalCost(input)
});

export const calculateHotelCostTool = defineTool({
  name: 'calculate_hotel_cost',
  description:
    "Calculates the total cost of a hotel stay. Requires 'price_per_night' (number), 'num_nights' (integer), " +
    "'currency' (e.g., 'USD'), and an optional 'description'.",
  inputSchema: HotelCostInputSchema,
  execute: async (input) => calculateHotelCost(input)
});

export const calculateDailyBudgetTool = defineTool({
  name: 'calculate_daily_budget',
  description:
    'Calculates the daily budget by dividing a total budget by the number of days. Requires ' +
    "'total_budget' (number), 'num_days' (integer), 'currency' (e.g., 'USD'), and an optional 'description'.",
  inputSchema: DailyBudgetInputSchema,
  execute: async (input) => calculateDailyBudget(input)
});
