import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

export const envSchema = z.object({
  PORT: z.string().default('3000').transform(Number),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  UNITS: z.enum(['metric', 'imperial']).default('metric'),
  STREAM_INTERVAL_MS: z.string().default('1000').transform(Number).pipe(z.number().int().min(50)),
  QUERY_SUPPORTED_PIDS: booleanFlag('true'),
  AUTO_CONNECT: booleanFlag('true'),
  DEMO_HANDSHAKE_MS: z.string().default('750').transform(Number).pipe(z.number().int().min(0)),
  DEMO_FAIL_REASON: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

const parsed = parseEnv(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
