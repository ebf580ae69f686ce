import { z } from 'zod';

/**
 * Fully resolved runtime configuration
 */
export interface AppConfig {
  interface: string;
  port: number;
  template: string;
  smbServer?: string;
  basicAuth: boolean;
  realm: string;
  redirectUrl: string;
  analyzeOnly: boolean;
  templatesDir: string;
  logFile: string;
  logRetentionDays: number;
}

export const DEFAULT_CONFIG = {
  port: 8888,
  template: 'office365',
  basicAuth: false,
  realm: 'Microsoft Corporation',
  redirectUrl: '',
  analyzeOnly: false,
  templatesDir: 'templates',
  logFile: 'logs/lanlure.log',
  logRetentionDays: 7,
} as const satisfies Partial<AppConfig>;

/**
 * Configuration validation error
 */
export class ConfigurationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type ConfigField = keyof AppConfig;
export type RawConfig = Partial<Record<ConfigField, string | boolean>>;

const INTERFACE_CHAR_BLACKLIST = /[^a-zA-Z0-9 ._-]/g;

const flag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) =>
    typeof value === 'boolean' ? value : ['true', '1', 'yes'].includes(value),
  );

const configSchema = z.object({
  interface: z
    .string({ required_error: 'interface is required' })
    .transform((value) => value.replace(INTERFACE_CHAR_BLACKLIST, ''))
    .pipe(z.string().min(1, 'interface is required')),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_CONFIG.port),
  template: z.string().min(1).default(DEFAULT_CONFIG.template),
  smbServer: z.string().ip('not a valid IP address for the SMB server').optional(),
  basicAuth: flag.default(DEFAULT_CONFIG.basicAuth),
  realm: z.string().default(DEFAULT_CONFIG.realm),
  redirectUrl: z
    .union([z.literal(''), z.string().url()])
    .default(DEFAULT_CONFIG.redirectUrl),
  analyzeOnly: flag.default(DEFAULT_CONFIG.analyzeOnly),
  templatesDir: z.string().min(1).default(DEFAULT_CONFIG.templatesDir),
  logFile: z.string().min(1).default(DEFAULT_CONFIG.logFile),
  logRetentionDays: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CONFIG.logRetentionDays),
});

/**
 * Environment variable names for each configurable field
 */
export const ENV_KEYS: Record<ConfigField, string> = {
  interface: 'LANLURE_INTERFACE',
  port: 'LANLURE_PORT',
  template: 'LANLURE_TEMPLATE',
  smbServer: 'LANLURE_SMB_SERVER',
  basicAuth: 'LANLURE_BASIC_AUTH',
  realm: 'LANLURE_REALM',
  redirectUrl: 'LANLURE_REDIRECT_URL',
  analyzeOnly: 'LANLURE_ANALYZE',
  templatesDir: 'LANLURE_TEMPLATES_DIR',
  logFile: 'LOG_FILE_PATH',
  logRetentionDays: 'LOG_RETENTION_DAYS',
};

const CONFIG_FIELDS = [
  'interface',
  'port',
  'template',
  'smbServer',
  'basicAuth',
  'realm',
  'redirectUrl',
  'analyzeOnly',
  'templatesDir',
  'logFile',
  'logRetentionDays',
] as const satisfies readonly ConfigField[];

export function readEnvironment(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const field of CONFIG_FIELDS) {
    const value = env[ENV_KEYS[field]];
    if (value !== undefined && value !== '') {
      raw[field] = value;
    }
  }
  return raw;
}

/**
 * Merge environment and command line values (command line wins) and validate
 */
export function resolveConfiguration(
  fromEnv: RawConfig,
  fromCli: RawConfig,
): AppConfig {
  const result = configSchema.safeParse({ ...fromEnv, ...fromCli });
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || undefined;
    const message = issue
      ? `Invalid ${field ?? 'configuration'}: ${issue.message}`
      : 'Invalid configuration';
    throw new ConfigurationError(message, field);
  }
  return result.data;
}
