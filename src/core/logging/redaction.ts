/**
 * Redaction configuration for pino.
 *
 * Cache roots and sidecar comments are user data but not secrets; what gets redacted is
 * anything that looks like a credential leaking in through env dumps or error objects.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',

    'err.config.*.token',
  ],
  censor: '[REDACTED]',
};
