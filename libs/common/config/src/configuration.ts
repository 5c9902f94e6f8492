/**
 * Tollgate Configuration
 * Environment variables for the auth service
 */

export interface BucketPolicyConfig {
  capacity: number;
  refillTokens: number;
  refillSeconds: number;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : parseInt(raw, 10);
}

export default () => ({
  // Service
  authServicePort: intFromEnv('AUTH_SERVICE_PORT', 8001),
  corsOrigin: process.env.CORS_ORIGIN,

  // Database Configuration
  databaseDsn: process.env.DATABASE_DSN,
  dbQueryTimeoutMs: intFromEnv('DB_QUERY_TIMEOUT_MS', 5000),
  dbConnectTimeoutMs: intFromEnv('DB_CONNECT_TIMEOUT_MS', 5000),

  // Signing keys (REQUIRED - a path or inline PEM for each half of the pair)
  jwt: {
    issuer: process.env.JWT_ISSUER || 'tollgate',
    privateKeyPath: process.env.JWT_PRIVATE_KEY_PATH,
    privateKey: process.env.JWT_PRIVATE_KEY,
    publicKeyPath: process.env.JWT_PUBLIC_KEY_PATH,
    publicKey: process.env.JWT_PUBLIC_KEY,
  },

  // Token TTLs
  accessTokenTtlSeconds: intFromEnv('ACCESS_TOKEN_TTL_SECONDS', 900), // 15 minutes
  refreshTokenTtlSeconds: intFromEnv('REFRESH_TOKEN_TTL_SECONDS', 1296000), // 15 days

  // Admission control
  rateLimit: {
    default: {
      capacity: intFromEnv('RATE_LIMIT_DEFAULT_CAPACITY', 100),
      refillTokens: intFromEnv('RATE_LIMIT_DEFAULT_REFILL_TOKENS', 100),
      refillSeconds: intFromEnv('RATE_LIMIT_DEFAULT_REFILL_SECONDS', 60),
    },
    loginRoute: {
      capacity: intFromEnv('RATE_LIMIT_LOGIN_CAPACITY', 5),
      refillTokens: intFromEnv('RATE_LIMIT_LOGIN_REFILL_TOKENS', 5),
      refillSeconds: intFromEnv('RATE_LIMIT_LOGIN_REFILL_SECONDS', 900),
    },
    loginPath: process.env.RATE_LIMIT_LOGIN_PATH || '/auth/login',
    maxBuckets: intFromEnv('RATE_LIMIT_MAX_BUCKETS', 10000),
  },

  // Audit bookkeeping
  failedAttempts: {
    maxEntries: intFromEnv('FAILED_ATTEMPTS_MAX_ENTRIES', 10000),
  },
});
