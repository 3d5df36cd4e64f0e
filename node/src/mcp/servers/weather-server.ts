/**
 * MCP tool server (stdio): get_weather.
 * Run: npm run mcp  (or npx tsx node/src/mcp/servers/weather-server.ts)
 * stdout is the protocol channel; logs go to stderr.
 */
import path from 'path';
import dotenv from 'dotenv';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadWeatherConfig } from '@/config/weather.config';
import { handleGetWeather } from '@/mcp/handlers';
import { getWeatherInputShape } from '@/mcp/tool-contract';
import { logger, setLogLevel } from '@/services/logger';
import { createWeatherService } from '@/services/weather-service';

async function main() {
  const config = loadWeatherConfig();
  setLogLevel(config.logLevel);
  const service = createWeatherService(config);

  const server = new McpServer({ name: 'weather', version: '1.0.0' });

  server.registerTool(
    'get_weather',
    {
      description: 'Get the current NWS forecast for a US city. Returns a short text report.',
      inputSchema: getWeatherInputShape,
    },
    async ({ city }) => handleGetWeather({ city }, service),
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Weather MCP server running on stdio');
}

main().catch((err) => {
  logger.fatal('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
