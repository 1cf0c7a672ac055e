/**
 * Keys redacted from operational log lines, at the root and one level deep.
 */
const SENSITIVE_KEYS = [
  'authorization',
  'cookie',
  'token',
  'access_token',
  'refresh_token',
  'password',
  'passphrase',
  'secret',
  'client_secret',
  'api_key',
  'apiKey',
  'private_key',
  'x_passphrase',
];

export const REDACT_PATHS: ReadonlyArray<string> = SENSITIVE_KEYS.flatMap((key) => [key, `*.${key}`]);

export const REDACT_CENSOR = '[REDACTED]';
