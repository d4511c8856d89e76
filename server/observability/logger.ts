import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

// stdout belongs to the MCP stdio transport, so every level goes to stderr
const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: process.env.NODE_ENV === 'test',
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  }),
];

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports,
});

/**
 * Describe a credential for logging without exposing it
 */
export function describeToken(token?: string): { available: boolean; length?: number } {
  if (!token) {
    return { available: false };
  }
  return { available: true, length: token.length };
}
