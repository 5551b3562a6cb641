import pino from 'pino';
import { CREDENTIAL_ENV_VARS } from '../../orchestrator/agent.js';

/**
 * Create a Pino logger instance with structured JSON output and credential redaction
 *
 * Features:
 * - JSON output for structured logging
 * - Log level from LOG_LEVEL env var (default: 'info')
 * - Redaction of provider API keys, forwarded env and credential maps
 *
 * @returns Pino logger instance
 */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): pino.Logger {
  return pino({
    level,
    redact: {
      paths: [
        'apiKey',
        '*.apiKey',
        'token',
        '*.token',
        'password',
        '*.password',
        'secret',
        '*.secret',
        'authorization',
        '*.authorization',
        'credentials',
        '*.credentials',
        'env',
        '*.env',
        ...CREDENTIAL_ENV_VARS,
        ...CREDENTIAL_ENV_VARS.map(name => `*.${name}`),
      ],
      censor: '[REDACTED]'
    }
  });
}

/**
 * Re-export Logger type from pino for use in other modules
 */
export type { Logger } from 'pino';
