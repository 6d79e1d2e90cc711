/**
 * Redaction paths for pino.
 *
 * Generative backends are usually configured with credentials, and collaborator
 * errors sometimes echo their request options back, so both shapes are covered.
 */
export const REDACTION_CONFIG = {
  paths: [
    'apiKey',
    'token',
    'secret',
    'authorization',

    '*.apiKey',
    '*.token',
    '*.secret',

    'headers.authorization',
    'headers.Authorization',
    'headers["x-api-key"]',

    'err.config.apiKey',
    'err.config.headers.authorization',
    'err.request.headers.authorization',
  ],
  censor: '[REDACTED]',
};
