import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config';
import { SamplerConfigError } from '../errors';

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.rounds).toBe(2);
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        SPEED_SAMPLER_ROUNDS: '5',
        SPEED_SAMPLER_MAX_TIME_MS: '2500',
        SPEED_SAMPLER_PING_COUNT: '8',
        SPEED_SAMPLER_SHOW_SAMPLES: 'Yes'
      })
    ).toEqual({ rounds: 5, maxTimeMs: 2500, pingCount: 8, showSamples: true });
  });

  it('treats blank variables as unset', () => {
    expect(loadConfig({ SPEED_SAMPLER_ROUNDS: '  ', SPEED_SAMPLER_SHOW_SAMPLES: '' })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects zero rounds', () => {
    expect(() => loadConfig({ SPEED_SAMPLER_ROUNDS: '0' })).toThrow(
      new SamplerConfigError('SPEED_SAMPLER_ROUNDS: Number must be greater than or equal to 1')
    );
  });

  it('rejects values that are not numbers or flags', () => {
    expect(() => loadConfig({ SPEED_SAMPLER_PING_COUNT: 'many' })).toThrow(SamplerConfigError);
    expect(() => loadConfig({ SPEED_SAMPLER_MAX_TIME_MS: '1.5' })).toThrow(SamplerConfigError);
    expect(() => loadConfig({ SPEED_SAMPLER_SHOW_SAMPLES: 'maybe' })).toThrow(SamplerConfigError);
  });
});
