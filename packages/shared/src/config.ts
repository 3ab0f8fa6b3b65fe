import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32, 'JWT secret must be at least 32 characters'),
});

/** `JWT_KEYS` holds a JSON array; anything unparsable is left for the array check to reject. */
const JwtKeysSchema = z.preprocess((raw) => {
  if (typeof raw !== 'string') return raw;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}, z.array(JwtKeySchema).min(1, 'At least one JWT key is required'));

export const JwtConfigSchema = z
  .object({
    JWT_ACTIVE_KID: z.string().min(1),
    JWT_KEYS: JwtKeysSchema,
    JWT_ISSUER: z.string().default('murmur'),
    JWT_AUDIENCE: z.string().default('murmur-clients'),
    JWT_ACCESS_TOKEN_TTL: z.coerce.number().int().positive().default(900),
    JWT_REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().positive().default(7),
  })
  .refine((cfg) => cfg.JWT_KEYS.some((k) => k.kid === cfg.JWT_ACTIVE_KID), {
    message: 'JWT_ACTIVE_KID must name one of JWT_KEYS',
    path: ['JWT_ACTIVE_KID'],
  });

export type JwtConfig = z.infer<typeof JwtConfigSchema>;

export const AuthPolicyConfigSchema = z.object({
  AUTH_MAX_FAILED_LOGINS: z.coerce.number().int().positive().default(5),
  AUTH_LOCKOUT_MINUTES: z.coerce.number().int().positive().default(30),
  AUTH_RESET_TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(24),
  APP_BASE_URL: z.string().url().default('http://localhost:3000'),
});

export type AuthPolicyConfig = z.infer<typeof AuthPolicyConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema).extend({
  OUTBOX_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  OUTBOX_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  OUTBOX_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  RETENTION_INTERVAL_MS: z.coerce.number().int().positive().default(3_600_000),
  TOKEN_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  NOTIFICATION_ARCHIVE_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  OUTBOX_RETENTION_DAYS: z.coerce.number().int().positive().default(7),
  WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.worker-healthy'),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

/** Everything a process that runs `AuthService` needs. */
export const AuthServiceConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(AuthPolicyConfigSchema)
  .and(JwtConfigSchema);

export type AuthServiceConfig = z.infer<typeof AuthServiceConfigSchema>;

export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
