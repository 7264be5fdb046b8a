export type AppConfig = Readonly<{
  port: number;
  host: string;
  origins: string[];
  logLevel: string;
  maxUploadBytes: number;
  previewRows: number;
  currencySymbol: string;
}>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function intFrom(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${env.LOG_LEVEL}'`);
  }

  return Object.freeze({
    port: intFrom(env, 'PORT', 4000, 0),
    host: env.HOST || '0.0.0.0',
    origins: (env.ORIGIN || '').split(',').map(o => o.trim()).filter(Boolean),
    logLevel,
    maxUploadBytes: intFrom(env, 'MAX_UPLOAD_BYTES', 10 * 1024 * 1024, 1),
    previewRows: intFrom(env, 'PREVIEW_ROWS', 5, 0),
    currencySymbol: env.CURRENCY_SYMBOL ?? '₹',
  });
}
