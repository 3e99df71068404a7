// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  appName: string;
  corsOrigins: string[];
}

export interface SessionConfig {
  dbPath: string;
  ttlDays: number;
  busyTimeoutMs: number;
  cleanupIntervalMs: number;
  cookieName: string;
  clientCookieName: string;
  linkParam: string;
}

export interface CredentialConfig {
  path: string;
  allowPlaintextPasswords: boolean;
}

export interface PasswordHashConfig {
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export interface IdentityCacheSettings {
  maxSize: number;
  idleMinutes: number;
}

export interface AppConfig {
  server: ServerConfig;
  session: SessionConfig;
  credentials: CredentialConfig;
  passwordHash: PasswordHashConfig;
  identityCache: IdentityCacheSettings;
}

const NODE_ENVS: ReadonlyArray<ServerConfig['nodeEnv']> = ['development', 'production', 'test'];

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  return NODE_ENVS.find((env) => env === value) ?? 'development';
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env.PORT || '3000', 10);

  return {
    port,
    host: env.HOST || 'localhost',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    appName: env.APP_NAME || 'shared-auth',
    corsOrigins: parseList(env.CORS_ORIGINS, [`http://localhost:${port}`, `http://127.0.0.1:${port}`]),
  };
}

export function buildSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  return {
    dbPath: env.SSO_DB_PATH || './data/auth_sessions.db',
    ttlDays: parseFloat(env.SSO_SESSION_TTL_DAYS || '30'),
    busyTimeoutMs: parseInt(env.SSO_DB_BUSY_TIMEOUT_MS || '5000', 10),
    cleanupIntervalMs: parseInt(env.SSO_CLEANUP_INTERVAL_MS || String(60 * 60 * 1000), 10),
    cookieName: env.SSO_COOKIE_NAME || 'sso_session_id',
    clientCookieName: env.SSO_CLIENT_COOKIE_NAME || 'sso_client',
    linkParam: env.SSO_LINK_PARAM || 'sessionId',
  };
}

export function buildCredentialConfig(env: NodeJS.ProcessEnv = process.env): CredentialConfig {
  return {
    path: env.SSO_CREDENTIALS_PATH || './data/credentials.json',
    allowPlaintextPasswords: parseBoolean(env.SSO_ALLOW_PLAINTEXT_PASSWORDS, true),
  };
}

export function buildPasswordHashConfig(env: NodeJS.ProcessEnv = process.env): PasswordHashConfig {
  return {
    memoryCost: parseInt(env.ARGON2_MEMORY_COST || '19456', 10),
    timeCost: parseInt(env.ARGON2_TIME_COST || '2', 10),
    parallelism: parseInt(env.ARGON2_PARALLELISM || '1', 10),
  };
}

export function buildIdentityCacheSettings(env: NodeJS.ProcessEnv = process.env): IdentityCacheSettings {
  return {
    maxSize: parseInt(env.SSO_IDENTITY_CACHE_SIZE || '5000', 10),
    idleMinutes: parseFloat(env.SSO_IDENTITY_IDLE_MINUTES || '120'),
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    session: buildSessionConfig(env),
    credentials: buildCredentialConfig(env),
    passwordHash: buildPasswordHashConfig(env),
    identityCache: buildIdentityCacheSettings(env),
  };
}

export function sessionTtlMs(config: SessionConfig): number {
  return config.ttlDays * 24 * 60 * 60 * 1000;
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (!(config.session.ttlDays > 0)) {
    errors.push('Session TTL must be a positive number of days (SSO_SESSION_TTL_DAYS)');
  }

  if (!(config.session.busyTimeoutMs >= 0)) {
    errors.push('Datastore busy timeout must be zero or more milliseconds (SSO_DB_BUSY_TIMEOUT_MS)');
  }

  if (!(config.session.cleanupIntervalMs >= 0)) {
    errors.push('Cleanup interval must be zero or more milliseconds (SSO_CLEANUP_INTERVAL_MS)');
  }

  if (config.session.cookieName === config.session.clientCookieName) {
    errors.push('Session cookie and client cookie must have different names');
  }

  if (!config.session.linkParam) {
    errors.push('Link parameter name is required (SSO_LINK_PARAM)');
  }

  if (!(config.passwordHash.memoryCost >= 1024)) {
    errors.push('Argon2 memory cost must be at least 1024 KiB (ARGON2_MEMORY_COST)');
  }

  if (!(config.passwordHash.timeCost >= 1)) {
    errors.push('Argon2 time cost must be at least 1 (ARGON2_TIME_COST)');
  }

  if (!(config.passwordHash.parallelism >= 1)) {
    errors.push('Argon2 parallelism must be at least 1 (ARGON2_PARALLELISM)');
  }

  if (!(config.identityCache.maxSize >= 1)) {
    errors.push('Identity cache size must be at least 1 (SSO_IDENTITY_CACHE_SIZE)');
  }

  return errors;
}
