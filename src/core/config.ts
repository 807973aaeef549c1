/**
 * Configuration management
 * Builds immutable entrypoint settings from an environment snapshot
 */

import { z } from 'zod';
import type { EntrypointSettings } from './types.js';
import { SettingsError } from './errors.js';

export const DEFAULTS = {
  host: '0.0.0.0',
  port: 5004,
  certRoot: '/certs',
  certPattern: '*-cert.pem',
  keyPattern: '*-key.pem',
  appRoot: '/home/pyuser/code',
  entryFile: 'main.py',
  appAttribute: 'app',
  searchDepth: 2,
  pythonCommand: 'python3',
  serverCommand: 'uvicorn',
} as const;

const port = z
  .string()
  .regex(/^\d+$/, 'must be an integer')
  .transform(Number)
  .pipe(z.number().int().min(1, 'must be between 1 and 65535').max(65535, 'must be between 1 and 65535'));

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid identifier');

const envSchema = z.object({
  APP_MODULE: z.string().optional(),
  SERVICE_NAME: z.string().optional(),
  HOST: z.string().default(DEFAULTS.host),
  PORT: port.optional(),
  SERVICE_PORT: port.optional(),
  RELOAD: z.string().optional(),
  EXTRA_ARGS: z.string().optional(),

  TLS_CERT_FILE: z.string().optional(),
  TLS_KEY_FILE: z.string().optional(),
  CERTS_DIR: z.string().default(DEFAULTS.certRoot),
  CERT_PATTERN: z.string().default(DEFAULTS.certPattern),
  KEY_PATTERN: z.string().default(DEFAULTS.keyPattern),

  APP_ROOT: z.string().default(DEFAULTS.appRoot),
  APP_ENTRY_FILE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*\.[A-Za-z0-9]+$/, 'must be a file name such as main.py')
    .default(DEFAULTS.entryFile),
  APP_ATTRIBUTE: identifier.default(DEFAULTS.appAttribute),
  APP_SEARCH_DEPTH: z
    .string()
    .regex(/^\d+$/, 'must be an integer')
    .transform(Number)
    .pipe(z.number().int().min(1, 'must be between 1 and 8').max(8, 'must be between 1 and 8'))
    .default(String(DEFAULTS.searchDepth)),
  PYTHONPATH: z.string().optional(),
  MODULE_PROBE: z.enum(['static', 'import']).default('static'),
  PYTHON_BIN: z.string().default(DEFAULTS.pythonCommand),

  SERVER_COMMAND: z.string().default(DEFAULTS.serverCommand),
  LOG_LEVEL: z
    .string()
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']))
    .default('INFO'),
});

/**
 * Split a free-text argument string on whitespace, as an unquoted shell expansion would
 */
export function splitWords(value: string | undefined): string[] {
  if (!value) return [];
  return value.trim().split(/\s+/).filter(word => word.length > 0);
}

/**
 * Drop unset and blank variables so they fall back to defaults
 */
function compactEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Parse the environment snapshot into settings
 *
 * @throws SettingsError listing every malformed variable
 */
export function loadSettings(env: NodeJS.ProcessEnv): EntrypointSettings {
  const parsed = envSchema.safeParse(compactEnv(env));

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new SettingsError(issues);
  }

  const vars = parsed.data;

  return Object.freeze({
    serviceName: vars.SERVICE_NAME,
    explicitModule: vars.APP_MODULE,
    host: vars.HOST,
    port: vars.PORT ?? vars.SERVICE_PORT ?? DEFAULTS.port,
    reload: vars.RELOAD === '1',
    extraArgs: Object.freeze(splitWords(vars.EXTRA_ARGS)),

    certFile: vars.TLS_CERT_FILE,
    keyFile: vars.TLS_KEY_FILE,
    certRoot: vars.CERTS_DIR,
    certPattern: vars.CERT_PATTERN,
    keyPattern: vars.KEY_PATTERN,

    appRoot: vars.APP_ROOT,
    entryFile: vars.APP_ENTRY_FILE,
    appAttribute: vars.APP_ATTRIBUTE,
    searchDepth: vars.APP_SEARCH_DEPTH,
    moduleSearchPaths: Object.freeze((vars.PYTHONPATH ?? '').split(':').filter(p => p.length > 0)),
    moduleProbe: vars.MODULE_PROBE,
    pythonCommand: vars.PYTHON_BIN,

    serverCommand: vars.SERVER_COMMAND,
    logLevel: vars.LOG_LEVEL,
  });
}

export const config = {
  load: loadSettings,
  splitWords,
  DEFAULTS,
};

export default config;
