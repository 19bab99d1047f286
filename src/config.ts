// ──────────────────────────────────────────
// Configuration — .env + typed parse
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CURRENCY_SYMBOL: z.string().min(1).default('$'),
  TOP_SOURCES_LIMIT: z.coerce.number().int().positive().default(10),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  SAMPLE_SEED: z.coerce.number().int().optional(),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
  MAX_SESSIONS: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  port: number;
  currencySymbol: string;
  topSourcesLimit: number;
  maxUploadBytes: number;
  sampleSeed?: number;
  sessionTtlMs: number;
  maxSessions: number;
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  // Blank values in .env mean "use the default"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration — ${issues}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    currencySymbol: parsed.CURRENCY_SYMBOL,
    topSourcesLimit: parsed.TOP_SOURCES_LIMIT,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    sampleSeed: parsed.SAMPLE_SEED,
    sessionTtlMs: parsed.SESSION_TTL_MINUTES * 60 * 1000,
    maxSessions: parsed.MAX_SESSIONS,
  };
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
