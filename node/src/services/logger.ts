// src/services/logger.ts — structured logging for the weather tool
import { Logger } from 'tslog';

export const logger = new Logger({
  name: 'weather-tool',
  minLevel: 3, // info
  type: 'hidden',
});

// stdout carries the MCP stdio protocol, so records go to stderr as JSON lines.
logger.attachTransport((logObj) => {
  process.stderr.write(`${JSON.stringify(logObj)}\n`);
});

export function setLogLevel(level: number): void {
  logger.settings.minLevel = level;
}
