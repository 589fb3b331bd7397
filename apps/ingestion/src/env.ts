import { z } from 'zod';
import { ConfigError } from './lib/ingestion-errors';

const intWithDefault = (fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER) =>
    z.coerce.number().int().min(min).max(max).default(fallback);

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const booleanFlag = z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true');

const envSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
        PORT: intWithDefault(3001, 1, 65535),
        LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

        SPOTIFY_CLIENT_ID: z.string().min(1),
        SPOTIFY_CLIENT_SECRET: z.string().min(1),
        SPOTIFY_REDIRECT_URI: z.string().url().default('http://127.0.0.1:8888/callback'),
        SPOTIFY_ACCOUNTS_URL: z.string().url().default('https://accounts.spotify.com'),
        SPOTIFY_API_URL: z.string().url().default('https://api.spotify.com/v1'),
        SPOTIFY_BOOTSTRAP_REFRESH_TOKEN: optionalString,

        STORAGE_DRIVER: z.enum(['s3', 'filesystem']).default('s3'),
        S3_BUCKET: optionalString,
        S3_REGION: z.string().min(1).default('us-east-1'),
        STORAGE_ROOT: z.string().min(1).default('./data'),
        OUTPUT_PREFIX: z.string().min(1).default('raw'),
        QUARANTINE_PREFIX: z.string().min(1).default('quarantine'),
        CREDENTIALS_KEY: z.string().min(1).default('secrets/spotify_token.json'),
        STATE_KEY: z.string().min(1).default('state/last_run_state.json'),
        ENCRYPTION_KEY: optionalString.refine(
            (value) => value === undefined || /^[0-9a-fA-F]{64}$/.test(value),
            'ENCRYPTION_KEY must be 64 hex characters (32 bytes)'
        ),

        FETCH_PAGE_LIMIT: intWithDefault(50, 1, 50),
        FETCH_MAX_PAGES: intWithDefault(10, 1),
        FIRST_RUN_BACKFILL: booleanFlag,
        BACKFILL_MAX_PAGES: intWithDefault(100, 1),
        FETCH_MAX_RETRIES: intWithDefault(3),
        FETCH_RETRY_BASE_MS: intWithDefault(500, 1),
        FETCH_RETRY_MAX_MS: intWithDefault(30_000, 1),
        FETCH_TIMEOUT_MS: intWithDefault(10_000, 1),
        STORAGE_MAX_RETRIES: intWithDefault(3),
        TOKEN_EXPIRY_SKEW_SECONDS: intWithDefault(60),

        CRON_SECRET: optionalString,
    })
    .superRefine((value, ctx) => {
        if (value.STORAGE_DRIVER === 's3' && !value.S3_BUCKET) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['S3_BUCKET'],
                message: 'S3_BUCKET is required when STORAGE_DRIVER is s3',
            });
        }
    });

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Readonly<Env> {
    const parsed = envSchema.safeParse(source);

    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
        );
    }

    return Object.freeze(parsed.data);
}
