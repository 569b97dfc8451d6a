import { afterEach, describe, it, expect, vi } from 'vitest';
import { getEngineConfig, loadEngineConfig, resetEngineConfig } from '@tailorkit/core';

describe('engine config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEngineConfig();
  });

  it('falls back to defaults for an empty environment', () => {
    expect(loadEngineConfig({})).toEqual({
      logLevel: 'info',
      keywordLimit: 20,
      minTokenLength: 3,
      maxBullets: 6,
      maxSkills: 18,
      minPositions: 2,
    });
  });

  it('coerces numeric strings', () => {
    const config = loadEngineConfig({ TAILOR_MAX_BULLETS: '4', LOG_LEVEL: 'debug' });
    expect(config.maxBullets).toBe(4);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects invalid values', () => {
    expect(() => loadEngineConfig({ TAILOR_KEYWORD_LIMIT: 'abc' })).toThrow();
    expect(() => loadEngineConfig({ TAILOR_MAX_SKILLS: '0' })).toThrow();
    expect(() => loadEngineConfig({ LOG_LEVEL: 'verbose' })).toThrow();
  });

  it('caches the process config until reset', () => {
    vi.stubEnv('TAILOR_MAX_SKILLS', '7');
    resetEngineConfig();
    expect(getEngineConfig().maxSkills).toBe(7);

    vi.stubEnv('TAILOR_MAX_SKILLS', '9');
    expect(getEngineConfig().maxSkills).toBe(7);

    resetEngineConfig();
    expect(getEngineConfig().maxSkills).toBe(9);
  });
});
