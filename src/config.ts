import {z} from 'zod';

export const VERSION = '1.0.0';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  APPLICATION_NAME: z.string().trim().min(1).default('todo-api'),
  EMISSARY_URL: z.string().url().optional(),
  TODO_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(30),
  REQUEST_DEADLINE_MS: z.coerce.number().int().positive().default(30_000),
});

export interface Config {
  port: number;
  applicationName: string;
  version: string;
  /** Chaos emissary the deployment talks to, reported by `/api/info`. */
  emissaryUrl: string | null;
  todoTtlMs: number;
  /** `0` disables the background sweep. */
  sweepIntervalMs: number;
  requestDeadlineMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reads the configuration from environment variables.
 * Blank variables count as unset.
 *
 * @throws {ConfigError} Listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')} (${issue.message})`)
      .join(', ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;

  return {
    port: vars.PORT,
    applicationName: vars.APPLICATION_NAME,
    version: VERSION,
    emissaryUrl: vars.EMISSARY_URL ?? null,
    todoTtlMs: vars.TODO_TTL_SECONDS * 1000,
    sweepIntervalMs: vars.SWEEP_INTERVAL_SECONDS * 1000,
    requestDeadlineMs: vars.REQUEST_DEADLINE_MS,
  };
}
