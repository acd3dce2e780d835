// Import zod for runtime type validation and schema definition
import { z } from 'zod';

// Accepts "true"/"false"/"1"/"0"/"yes"/"no" (case-insensitive); z.coerce.boolean() would read "false" as true
const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a boolean flag' });
    return z.NEVER;
  });

/**
 * Environment variable schema
 * Validated once at startup by ConfigModule
 */
const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().int().positive().optional(),

  // MySQL connection
  DB_HOST: z.string().min(1).optional(),
  DB_PORT: z.coerce.number().int().positive().optional(),
  DB_USER: z.string().min(1).optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).optional(),
  DB_SSL: booleanFlag.optional(),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  DB_CONNECTION_LIMIT: z.coerce.number().int().positive().optional(),

  // Bearer token verification (HS256)
  JWT_SECRET: z.string().min(16),
  JWT_ISSUER: z.string().min(1).optional(),

  SWAGGER_ENABLED: booleanFlag.optional()
});

// Export inferred TypeScript type from the schema
export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables at application startup
 * @param config - Raw environment variable object from process.env
 * @returns Validated and typed environment configuration
 * @throws Error naming only the offending keys (values are never echoed)
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = envSchema.safeParse(config);
  if (result.success) return result.data;

  const keys = Array.from(
    new Set(
      result.error.issues
        .map((issue) => issue.path[0])
        .filter((k): k is string => typeof k === 'string' && k.length > 0)
    )
  );
  const keyList = keys.length > 0 ? keys.join(', ') : 'unknown keys';
  throw new Error(
    `Invalid environment configuration. Missing/invalid: ${keyList}. ` +
      'Create apps/user-api/.env.local from apps/user-api/.env.example.'
  );
}
