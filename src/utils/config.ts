import { z } from 'zod';
import { BotError } from '../types/index.js';

const ConfigSchema = z.object({
  DATA_DIR: z.string().min(1).default('data'),
  TIMEZONE: z.string().min(1).default('Asia/Kolkata'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MAX_PERIOD: z.coerce.number().int().min(1).max(24).default(9),
  FAQ_MIN_SCORE: z.coerce.number().min(1).default(10),
  SEMANTIC_ENCODER: z.enum(['hashing', 'gemini']).default('hashing'),
  SEMANTIC_MAX_DISTANCE: z.coerce.number().positive().max(2).default(0.9),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_EMBED_MODEL: z.string().min(1).default('text-embedding-004'),
  INTENT_INDEX_PATH: z.string().optional()
}).refine(
  (cfg) => cfg.SEMANTIC_ENCODER !== 'gemini' || Boolean(cfg.GEMINI_API_KEY?.trim()),
  { message: 'GEMINI_API_KEY is required when SEMANTIC_ENCODER=gemini', path: ['GEMINI_API_KEY'] }
);

export type BotConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  // empty strings from .env files count as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new BotError(`Invalid configuration: ${detail}`, 'CONFIG_INVALID');
  }
  return parsed.data;
}
