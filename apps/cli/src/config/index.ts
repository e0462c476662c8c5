/**
 * CLI Configuration
 *
 * Loaded before anything that logs: the shared logger reads LOG_LEVEL and
 * NODE_ENV when it is first imported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// .env from the working directory
dotenvConfig();

const positiveInt = (fallback: string) =>
  z.string().regex(/^\d+$/, 'must be a positive integer').default(fallback).transform(Number)
    .refine((n) => n > 0, 'must be a positive integer');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),

  // Media tools
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().min(1).default('ffprobe'),

  // Parent of the per-run temp directory (OS default when unset)
  BOOKBINDER_TEMP_DIR: z.string().min(1).optional(),
  BOOKBINDER_CHAPTER_THRESHOLD: positiveInt('6'),
  BOOKBINDER_COMMAND_TIMEOUT_MS: positiveInt('3600000'), // 1 hour
});

export type Env = z.infer<typeof envSchema>;

export function buildConfig(env: Env) {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    mediaTools: {
      ffmpeg: env.FFMPEG_PATH,
      ffprobe: env.FFPROBE_PATH,
    },

    tempDir: env.BOOKBINDER_TEMP_DIR,
    chapterThreshold: env.BOOKBINDER_CHAPTER_THRESHOLD,
    commandTimeoutMs: env.BOOKBINDER_COMMAND_TIMEOUT_MS,
  } as const;
}

export type CliConfig = ReturnType<typeof buildConfig>;

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

// Picked up by the shared logger
process.env['NODE_ENV'] = env.NODE_ENV;
process.env['LOG_LEVEL'] = env.LOG_LEVEL;

export const config = buildConfig(env);
