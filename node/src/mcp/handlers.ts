/**
 * In-process MCP tool handlers. Provider failures are already text by the time they reach here.
 */
import { loadWeatherConfig } from '@/config/weather.config';
import type { GetWeatherToolInput, GetWeatherToolResult } from '@/mcp/tool-contract';
import { createWeatherService, type WeatherService } from '@/services/weather-service';

let weatherService: WeatherService | null = null;

function getWeatherService(): WeatherService {
  if (!weatherService) weatherService = createWeatherService(loadWeatherConfig());
  return weatherService;
}

export async function handleGetWeather(
  input: GetWeatherToolInput,
  service: WeatherService = getWeatherService(),
): Promise<GetWeatherToolResult> {
  const text = await service.getWeather(input.city);
  return { content: [{ type: 'text', text }] };
}
