// Application configuration management with environment variable parsing and validation
import { fileURLToPath } from 'node:url';
import { type Result, err, ok } from 'neverthrow';
import { z } from 'zod';

const DEV_SESSION_SECRET = 'development-only-session-secret-000000';

const DEFAULT_ANALYZERS_FILE = fileURLToPath(new URL('../../config/analyzers.json', import.meta.url));

const configSchema = z
  .object({
    port: z.number().int().min(1).max(65535),
    host: z.string().min(1),
    nodeEnv: z.enum(['development', 'production', 'test']),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),

    sessionSecret: z.string().min(32, 'SESSION_SECRET must be at least 32 characters'),
    sessionCookieSecure: z.union([z.literal('auto'), z.boolean()]),
    corsOrigins: z.array(z.string().min(1)),

    storeBackend: z.enum(['memory', 'mongo']),
    mongoUri: z.string().optional(),
    mongoDbName: z.string().min(1),

    fetchTimeoutMs: z.number().positive(),
    fallbackFetchTimeoutMs: z.number().positive(),
    maxHtmlBytes: z.number().positive(),
    maxRedirectFollows: z.number().int().min(0).max(10),
    allowDnsFailure: z.boolean(),
    blockedPorts: z.array(z.number().int().min(1).max(65535)),

    // Cap applied to extracted text and to analyzer input alike
    maxTextLength: z.number().int().positive(),

    extractCacheTtlSec: z.number().positive(),
    extractCacheMaxSize: z.number().int().positive(),

    analyzersFile: z.string().min(1),
    analyzerWorkdir: z.string().min(1),
    analyzerTimeoutMs: z.number().positive(),
    defaultAnalyzer: z.string().min(1),

    rateLimitMax: z.number().positive(),
    rateLimitTimeWindow: z.string().min(1),
  })
  .refine((cfg) => cfg.storeBackend !== 'mongo' || Boolean(cfg.mongoUri), {
    message: 'MONGODB_URI is required when STORE_BACKEND=mongo',
    path: ['mongoUri'],
  });

export type AppConfig = z.infer<typeof configSchema>;

const parseSecureFlag = (value: string | undefined): 'auto' | boolean => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return 'auto';
};

const parseList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, string[]> {
  const nodeEnv = env.NODE_ENV || 'development';

  const rawConfig = {
    port: Number.parseInt(env.PORT || '5000', 10),
    host: env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel: env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),

    sessionSecret: env.SESSION_SECRET || (nodeEnv === 'production' ? '' : DEV_SESSION_SECRET),
    sessionCookieSecure: parseSecureFlag(env.SESSION_COOKIE_SECURE),
    corsOrigins: parseList(env.CORS_ORIGINS || 'http://localhost:5173,http://localhost:3000'),

    storeBackend: env.STORE_BACKEND || 'memory',
    mongoUri: env.MONGODB_URI,
    mongoDbName: env.MONGODB_DB_NAME || 'bias_meter',

    fetchTimeoutMs: Number.parseInt(env.FETCH_TIMEOUT_MS || '30000', 10),
    fallbackFetchTimeoutMs: Number.parseInt(env.FALLBACK_FETCH_TIMEOUT_MS || '10000', 10),
    maxHtmlBytes: Number.parseInt(env.MAX_HTML_BYTES || '10485760', 10), // 10MB
    maxRedirectFollows: Number.parseInt(env.MAX_REDIRECT_FOLLOWS || '5', 10),
    allowDnsFailure: env.ALLOW_DNS_FAILURE === 'true',
    blockedPorts: parseList(env.BLOCKED_PORTS || '22,3306,5432,6379,9200,27017').map((port) =>
      Number.parseInt(port, 10)
    ),

    maxTextLength: Number.parseInt(env.MAX_TEXT_LENGTH || '5000', 10),

    extractCacheTtlSec: Number.parseInt(env.EXTRACT_CACHE_TTL_SEC || '3600', 10),
    extractCacheMaxSize: Number.parseInt(env.EXTRACT_CACHE_MAX_SIZE || '500', 10),

    analyzersFile: env.ANALYZERS_FILE || DEFAULT_ANALYZERS_FILE,
    analyzerWorkdir: env.ANALYZER_WORKDIR || process.cwd(),
    analyzerTimeoutMs: Number.parseInt(env.ANALYZER_TIMEOUT_MS || '120000', 10),
    defaultAnalyzer: env.DEFAULT_ANALYZER || 'lexicon',

    rateLimitMax: Number.parseInt(env.RATE_LIMIT_MAX || '100', 10),
    rateLimitTimeWindow: env.RATE_LIMIT_TIME_WINDOW || '1 minute',
  };

  const validation = configSchema.safeParse(rawConfig);
  if (!validation.success) {
    return err(
      validation.error.issues.map((issue) => `${issue.path.map(String).join('.') || 'config'}: ${issue.message}`)
    );
  }

  return ok(validation.data);
}
