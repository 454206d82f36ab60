// =====================================================
// Application Configuration
// =====================================================

function intFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 3000),
  corsOrigin: process.env.CORS_ORIGIN || '*',

  // Database
  databaseUrl: process.env.DATABASE_URL || '',

  // Redis
  redis: {
    enabled: process.env.REDIS_DISABLED !== 'true',
    url: process.env.REDIS_URL || 'redis://localhost:6379',
    host: process.env.REDIS_HOST || 'localhost',
    port: intFromEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },

  // JWT (tokens are issued by the identity service; we only verify)
  jwt: {
    accessSecret: process.env.JWT_ACCESS_SECRET || 'dev-access-secret',
  },

  // Sentry
  sentry: {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
  },

  // Rate Limiting
  rateLimit: {
    windowMs: 60 * 1000, // 1 minute
    max: 100, // 100 requests per window
    queueMax: 20, // queue joins per window
  },

  // Matchmaking
  matchmaking: {
    poolTtlSeconds: intFromEnv('MATCHMAKING_POOL_TTL_SECONDS', 600),
    baseBand: 150,
    bandStep: 50, // widened every bandStepMs of waiting
    bandStepMs: 30 * 1000,
    maxBand: 500,
    waitBonusPerSecond: 1,
    maxWaitBonus: 300,
    maxFormationAttempts: 3,
  },

  // Game
  game: {
    maxRounds: intFromEnv('GAME_MAX_ROUNDS', 5),
    roundDurationMs: intFromEnv('GAME_ROUND_DURATION_MS', 15 * 1000),
    interRoundDelayMs: intFromEnv('GAME_INTER_ROUND_DELAY_MS', 3 * 1000),
    pointsPerRound: 100,
    idleGraceMs: intFromEnv('GAME_IDLE_GRACE_MS', 120 * 1000),
    sessionSnapshotTtlSeconds: 60 * 60,
  },

  // Rating
  rating: {
    defaultRating: 1000,
    floor: 100,
    ceiling: 3000,
    kFactor: 32,
    adaptiveK: process.env.RATING_ADAPTIVE_K !== 'false',
  },

  // Realtime transport
  transport: {
    reconnectWindowMs: intFromEnv('RECONNECT_WINDOW_MS', 30 * 1000),
    sendTimeoutMs: 2000,
    maxMalformedMessages: 5,
  },

  // Economy rewards (coins)
  economy: {
    winGame: 50,
    loseGame: 10,
    drawGame: 25,
    winRound: 10,
    loseRound: 2,
    perfectGameMultiplier: 2,
    streakThreshold: 3,
    streakBonusPerGame: 0.1,
    maxStreakMultiplier: 2,
  },

  // Content
  content: {
    catalogUrl: process.env.QUESTION_CATALOG_URL || '',
    requestTimeoutMs: 3000,
  },
} as const;

export type AppConfig = typeof config;

// Validate required environment variables
export function validateConfig(): void {
  const required = ['DATABASE_URL', 'JWT_ACCESS_SECRET'];

  for (const key of required) {
    if (!process.env[key]) {
      console.warn(`Warning: Missing environment variable: ${key}`);
    }
  }
}
