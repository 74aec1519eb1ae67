import 'dotenv/config';
import { z } from 'zod';
import { DEFAULT_CASEWORKER_ALIAS } from '@shared/constants';
import type { MomentumClientConfig } from '@momentum-client/client';

const envSchema = z.object({
  MOMENTUM_BASE_URL: z.string().url(),
  MOMENTUM_TOKEN_URL: z.string().url(),
  MOMENTUM_CLIENT_ID: z.string().min(1),
  MOMENTUM_CLIENT_SECRET: z.string().min(1),
  MOMENTUM_API_KEY: z.string().min(1),
  MOMENTUM_RESOURCE: z.string().min(1),
  MOMENTUM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CASEWORKER_ALIAS: z.string().min(1).default(DEFAULT_CASEWORKER_ALIAS),
});

export interface WorkerConfig {
  momentum: MomentumClientConfig;
  caseworkerAlias: string;
}

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid worker configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    momentum: {
      baseUrl: e.MOMENTUM_BASE_URL,
      tokenUrl: e.MOMENTUM_TOKEN_URL,
      clientId: e.MOMENTUM_CLIENT_ID,
      clientSecret: e.MOMENTUM_CLIENT_SECRET,
      apiKey: e.MOMENTUM_API_KEY,
      resource: e.MOMENTUM_RESOURCE,
      timeoutMs: e.MOMENTUM_TIMEOUT_MS,
    },
    caseworkerAlias: e.CASEWORKER_ALIAS,
  };
}
