import { z } from 'zod';
import { SamplerConfigError } from './errors';
import { SamplerConfig } from './types/SpeedTypes';

export const DEFAULT_CONFIG: SamplerConfig = {
  rounds: 2,
  maxTimeMs: 10_000,
  pingCount: 5,
  showSamples: false
};

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const EnvSchema = z.object({
  SPEED_SAMPLER_ROUNDS: z.coerce.number().int().min(1).max(100).optional(),
  SPEED_SAMPLER_MAX_TIME_MS: z.coerce.number().int().positive().optional(),
  SPEED_SAMPLER_PING_COUNT: z.coerce.number().int().min(1).max(20).optional(),
  SPEED_SAMPLER_SHOW_SAMPLES: flag.optional()
});

// Empty variables count as unset
function present(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value.toLowerCase() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SamplerConfig {
  const parsed = EnvSchema.safeParse({
    SPEED_SAMPLER_ROUNDS: present(env, 'SPEED_SAMPLER_ROUNDS'),
    SPEED_SAMPLER_MAX_TIME_MS: present(env, 'SPEED_SAMPLER_MAX_TIME_MS'),
    SPEED_SAMPLER_PING_COUNT: present(env, 'SPEED_SAMPLER_PING_COUNT'),
    SPEED_SAMPLER_SHOW_SAMPLES: present(env, 'SPEED_SAMPLER_SHOW_SAMPLES')
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') ?? 'environment';
    throw new SamplerConfigError(`${key}: ${issue?.message ?? 'invalid value'}`);
  }

  return {
    rounds: parsed.data.SPEED_SAMPLER_ROUNDS ?? DEFAULT_CONFIG.rounds,
    maxTimeMs: parsed.data.SPEED_SAMPLER_MAX_TIME_MS ?? DEFAULT_CONFIG.maxTimeMs,
    pingCount: parsed.data.SPEED_SAMPLER_PING_COUNT ?? DEFAULT_CONFIG.pingCount,
    showSamples: parsed.data.SPEED_SAMPLER_SHOW_SAMPLES ?? DEFAULT_CONFIG.showSamples
  };
}
