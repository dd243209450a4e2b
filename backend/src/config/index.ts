export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';

export interface ServerConfig {
  port: number;
  serviceMessage: string;
  maxSyncSizeKb: number;
  statusRoute: string;
  corsOrigin: string;
  buildStamp: string;
}

export interface StorageConfig {
  file: string;
  initTimeoutSeconds: number;
}

export interface SecurityConfig {
  acceptNewSyncs: boolean;
  /** Empty disables the route. */
  syncToggleRoute: string;
}

export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  security: SecurityConfig;
  log: { level: LogLevel };
}

export class ConfigError extends Error {
  constructor(public readonly variable: string, value: string, expected: string) {
    super(`Invalid value "${value}" for ${variable}: expected ${expected}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

export const defaultConfig = (env: Env = process.env): AppConfig => ({
  server: {
    port: 8080,
    serviceMessage: '',
    maxSyncSizeKb: 512,
    statusRoute: '/status',
    corsOrigin: '*',
    buildStamp: '[unstamped]',
  },
  storage: {
    file: 'marksync.db',
    initTimeoutSeconds: 5,
  },
  security: {
    acceptNewSyncs: true,
    syncToggleRoute: '',
  },
  log: {
    level: env.NODE_ENV === 'production' ? 'info' : 'debug',
  },
});

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

const parseInteger = (variable: string, raw: string, min = 0, max = Number.MAX_SAFE_INTEGER): number => {
  const value = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!(value >= min && value <= max)) {
    throw new ConfigError(variable, raw, `an integer from ${min} to ${max}`);
  }
  return value;
};

const parseBoolean = (variable: string, raw: string): boolean => {
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigError(variable, raw, 'true or false');
  }
};

const parseRoute = (variable: string, raw: string): string => {
  if (!raw.startsWith('/')) {
    throw new ConfigError(variable, raw, 'a path starting with "/"');
  }
  return raw;
};

const parseLogLevel = (variable: string, raw: string): LogLevel => {
  const level = LOG_LEVELS.find((candidate) => candidate === raw.toLowerCase());
  if (!level) {
    throw new ConfigError(variable, raw, LOG_LEVELS.join(', '));
  }
  return level;
};

interface EnvOverride {
  option: string;
  variable: string;
  apply: (config: AppConfig, raw: string) => void;
}

/**
 * Every configuration option that can be set from the environment.
 */
export const ENV_OVERRIDES: readonly EnvOverride[] = [
  { option: 'server.port', variable: 'PORT', apply: (c, raw) => { c.server.port = parseInteger('PORT', raw, 1, 65535); } },
  { option: 'server.serviceMessage', variable: 'SYNC_SERVICE_MESSAGE', apply: (c, raw) => { c.server.serviceMessage = raw; } },
  {
    option: 'server.maxSyncSizeKb',
    variable: 'SYNC_MAX_SIZE_KB',
    apply: (c, raw) => { c.server.maxSyncSizeKb = parseInteger('SYNC_MAX_SIZE_KB', raw, 1); },
  },
  {
    option: 'server.statusRoute',
    variable: 'SYNC_STATUS_ROUTE',
    apply: (c, raw) => { c.server.statusRoute = parseRoute('SYNC_STATUS_ROUTE', raw); },
  },
  { option: 'server.corsOrigin', variable: 'CORS_ORIGIN', apply: (c, raw) => { c.server.corsOrigin = raw; } },
  { option: 'server.buildStamp', variable: 'BUILD_STAMP', apply: (c, raw) => { c.server.buildStamp = raw; } },
  { option: 'storage.file', variable: 'SYNC_STORAGE_FILE', apply: (c, raw) => { c.storage.file = raw; } },
  {
    option: 'storage.initTimeoutSeconds',
    variable: 'SYNC_INIT_TIMEOUT',
    apply: (c, raw) => { c.storage.initTimeoutSeconds = parseInteger('SYNC_INIT_TIMEOUT', raw); },
  },
  {
    option: 'security.acceptNewSyncs',
    variable: 'SYNC_ACCEPT_NEW',
    apply: (c, raw) => { c.security.acceptNewSyncs = parseBoolean('SYNC_ACCEPT_NEW', raw); },
  },
  {
    option: 'security.syncToggleRoute',
    variable: 'SYNC_TOGGLE_ROUTE',
    apply: (c, raw) => { c.security.syncToggleRoute = parseRoute('SYNC_TOGGLE_ROUTE', raw); },
  },
  { option: 'log.level', variable: 'LOG_LEVEL', apply: (c, raw) => { c.log.level = parseLogLevel('LOG_LEVEL', raw); } },
];

/**
 * Build the configuration from defaults and environment overrides.
 * Empty variables are ignored. Throws {@link ConfigError} on unparsable values.
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  const config = defaultConfig(env);

  for (const override of ENV_OVERRIDES) {
    const raw = env[override.variable];
    if (raw === undefined || raw === '') continue;
    override.apply(config, raw);
  }

  return config;
};

/**
 * Options whose value comes from the environment, for startup logging.
 */
export const overriddenOptions = (env: Env = process.env): string[] =>
  ENV_OVERRIDES.filter((override) => Boolean(env[override.variable])).map(
    (override) => `${override.option} (${override.variable})`
  );
