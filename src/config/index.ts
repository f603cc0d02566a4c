import dotenv from 'dotenv';

// Load environment variables
dotenv.config({
  quiet: process.env.NODE_ENV === 'test' || process.env.DOTENV_CONFIG_QUIET === 'true',
});

function getEnvVarOptional(key: string, defaultValue = ''): string {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric environment variable: ${key}`);
  }

  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export interface ReconcilerConfig {
  monitoring: {
    // Server base URL; `login_url` in module parameters overrides it
    url: string;
    user: string;
    password: string;
  };
  rpc: {
    timeoutMs: number;
    // Older servers only know `user.authenticate` with a `user` field
    legacyAuth: boolean;
  };
  logging: {
    level: string;
    file: string;
  };
}

export function loadConfig(): ReconcilerConfig {
  return {
    monitoring: {
      url: getEnvVarOptional('MONITORING_URL'),
      user: getEnvVarOptional('MONITORING_USER', 'Admin'),
      password: getEnvVarOptional('MONITORING_PASSWORD'),
    },
    rpc: {
      timeoutMs: getEnvNumber('RPC_TIMEOUT_MS', 10_000),
      legacyAuth: getEnvBoolean('RPC_LEGACY_AUTH', false),
    },
    logging: {
      level: getEnvVarOptional('LOG_LEVEL', 'info'),
      file: getEnvVarOptional('LOG_FILE'),
    },
  };
}

export const config = loadConfig();
