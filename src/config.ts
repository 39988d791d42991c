import { z } from 'zod';
import type { RunMode } from './connection/types.js';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const port = z.coerce.number().int().min(1).max(65535);

const envSchema = z
  .object({
    PLINK_PROXY_MODE: booleanFlag.default('false'),
    PLINK_LISTEN_HOST: z.string().min(1).default('0.0.0.0'),
    PLINK_LISTEN_PORT: port.default(5001),
    PLINK_UPSTREAM_HOST: z.string().min(1).optional(),
    PLINK_UPSTREAM_PORT: port.default(5001),
    PLINK_INJECTOR_HOST: z.string().min(1).default('127.0.0.1'),
    PLINK_INJECTOR_PORT: port.default(5002),
    PLINK_MESSAGE_LOG: z.enum(['summary', 'verbose']).default('summary'),
    PLINK_WATCHDOG_SECONDS: z.coerce.number().int().min(0).default(120),
  })
  .superRefine((env, ctx) => {
    if (env.PLINK_PROXY_MODE && !env.PLINK_UPSTREAM_HOST) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PLINK_UPSTREAM_HOST'],
        message: 'required when PLINK_PROXY_MODE is on',
      });
    }
  });

export type MessageLog = 'summary' | 'verbose';

export interface Endpoint {
  host: string;
  port: number;
}

export interface AppConfig {
  mode: RunMode;
  listen: Endpoint;
  upstream?: Endpoint;
  injector: Endpoint;
  messageLog: MessageLog;
  watchdogSeconds: number;
}

/** Build the config from `PLINK_*` variables. Throws listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration\n  ${problems.join('\n  ')}`);
  }
  const e = parsed.data;
  return {
    mode: e.PLINK_PROXY_MODE ? 'proxy' : 'standalone',
    listen: { host: e.PLINK_LISTEN_HOST, port: e.PLINK_LISTEN_PORT },
    upstream: e.PLINK_UPSTREAM_HOST
      ? { host: e.PLINK_UPSTREAM_HOST, port: e.PLINK_UPSTREAM_PORT }
      : undefined,
    injector: { host: e.PLINK_INJECTOR_HOST, port: e.PLINK_INJECTOR_PORT },
    messageLog: e.PLINK_MESSAGE_LOG,
    watchdogSeconds: e.PLINK_WATCHDOG_SECONDS,
  };
}
