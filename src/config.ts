import { z } from 'zod';
import { ValuationError } from './utils/errors';

// Environment handling:
// - VALUATION_API_URL points at the market-data backend
// - Falls back to http://localhost:8000 with a warning when not set
// - GEMINI_API_KEY is only needed when peers are not passed on the command line

export const DEFAULT_API_BASE = 'http://localhost:8000';

const EnvSchema = z.object({
  VALUATION_API_URL: z.string().url().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  PEER_COUNT: z.coerce.number().int().min(1).max(50).default(8),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(90000)
});

export interface AppConfig {
  apiBaseUrl: string;
  geminiApiKey: string | null;
  geminiModel: string;
  peerCount: number;
  requestTimeoutMs: number;
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  // Blank entries in .env count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ValuationError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  if (!values.VALUATION_API_URL) {
    console.warn(`VALUATION_API_URL not set; falling back to ${DEFAULT_API_BASE}`);
  }

  return {
    apiBaseUrl: values.VALUATION_API_URL ?? DEFAULT_API_BASE,
    geminiApiKey: values.GEMINI_API_KEY ?? null,
    geminiModel: values.GEMINI_MODEL,
    peerCount: values.PEER_COUNT,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS
  };
};
