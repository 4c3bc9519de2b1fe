import pino from 'pino';

/**
 * Create a Pino logger instance with structured JSON output and credential redaction
 *
 * Features:
 * - JSON output on stderr (stdout carries the analysis result)
 * - Log level from LOG_LEVEL env var (default: 'info')
 * - Automatic redaction of sensitive fields (apiKey, token, password, etc.)
 *
 * @returns Pino logger instance
 */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): pino.Logger {
  return pino(
    {
      level,
      redact: {
        paths: [
          'apiKey',
          '*.apiKey',
          'providers[*].apiKey',
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
          'env.OPENAI_API_KEY',
          'env.GEMINI_API_KEY',
          'env.NVIDIA_API_KEY',
          'env.ANTHROPIC_API_KEY'
        ],
        censor: '[REDACTED]'
      }
    },
    pino.destination(2)
  );
}
