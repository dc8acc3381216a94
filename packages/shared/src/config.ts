import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
  // Google (Gemini scripts, TTS fallback, math detection)
  geminiApiKey: z.string().default(''),
  geminiModel: z.string().default('gemini-2.0-flash'),

  // ElevenLabs (primary TTS)
  elevenlabsApiKey: z.string().default(''),
  elevenlabsVoiceId: z.string().default('onwK4e9ZLuTAKqWW03F9'),

  // Pexels (stock footage)
  pexelsApiKey: z.string().default(''),

  // Media tools
  ffmpegPath: z.string().default('ffmpeg'),
  ffprobePath: z.string().default('ffprobe'),
  manimPath: z.string().default('manim'),
  outputDir: z.string().default('static'),

  // Pipeline
  maxConcurrency: z.coerce.number().int().min(1).default(3),
  maxRetries: z.coerce.number().int().min(0).default(2),
  retryInitialDelayMs: z.coerce.number().int().min(0).default(1000),
  stageTimeoutMs: z.coerce.number().int().min(0).default(120_000),
  dryRun: booleanFlag.default('true'),

  // Dashboard
  dashboardPort: z.coerce.number().int().min(1).default(3000),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

/** Parse config from an env-like record. Exposed for tests. */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = configSchema.safeParse({
    geminiApiKey: env.GEMINI_API_KEY,
    geminiModel: env.GEMINI_MODEL,
    elevenlabsApiKey: env.ELEVENLABS_API_KEY,
    elevenlabsVoiceId: env.ELEVENLABS_VOICE_ID,
    pexelsApiKey: env.PEXELS_API_KEY,
    ffmpegPath: env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
    manimPath: env.MANIM_PATH,
    outputDir: env.OUTPUT_DIR,
    maxConcurrency: env.MAX_CONCURRENCY,
    maxRetries: env.MAX_RETRIES,
    retryInitialDelayMs: env.RETRY_INITIAL_DELAY_MS,
    stageTimeoutMs: env.STAGE_TIMEOUT_MS,
    dryRun: env.DRY_RUN,
    dashboardPort: env.DASHBOARD_PORT,
    logLevel: env.LOG_LEVEL,
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const invalid = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${invalid}`);
  }

  return result.data;
}

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

/** Live runs need credentials for every remote collaborator */
export function missingCredentials(config: Config): string[] {
  const missing: string[] = [];
  if (!config.geminiApiKey) missing.push('GEMINI_API_KEY');
  if (!config.elevenlabsApiKey) missing.push('ELEVENLABS_API_KEY');
  if (!config.pexelsApiKey) missing.push('PEXELS_API_KEY');
  return missing;
}
