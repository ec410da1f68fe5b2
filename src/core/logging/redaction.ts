/**
 * Redaction configuration for pino.
 *
 * Auth tokens and one-time codes must never reach a log line. Request URLs
 * carrying `access_token` are not logged at all; callers log the path instead.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'authToken',
    'accessToken',
    'access_token',
    'authCode',
    'authorization',

    '*.token',
    '*.authToken',
    '*.accessToken',
    '*.access_token',
    '*.authCode',

    'headers.authorization',
    'headers.Authorization',

    'err.token',
    'err.request.token',
  ],
  censor: '[REDACTED]',
};
