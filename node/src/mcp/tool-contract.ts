/**
 * Contract for the get_weather MCP tool: input args and result shape.
 */
import { z } from 'zod';

export const getWeatherInputShape = {
  city: z.string().min(1).describe('The name of the city (e.g. "San Francisco, CA")'),
};

export const getWeatherInputSchema = z.object(getWeatherInputShape);

/** Input for get_weather tool. */
export type GetWeatherToolInput = z.infer<typeof getWeatherInputSchema>;

/** get_weather always answers with a single text item, failures included. */
export type GetWeatherToolResult = {
  content: Array<{ type: 'text'; text: string }>;
};
