import { CANONICAL_PROFILE, parseEnv } from './config.js';

describe('parseEnv', () => {
  it('fills defaults for an empty environment', () => {
    const env = parseEnv({});
    expect(env.PANEL_DURATION_MS).toBe(4000);
    expect(env.DURATION_TOLERANCE_MS).toBe(2000);
    expect(env.MIN_WORD_DURATION_MS).toBe(50);
    expect(env.FFMPEG_PATH).toBe('ffmpeg');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.FAL_KEY).toBeUndefined();
  });

  it('coerces numeric settings from strings', () => {
    const env = parseEnv({ PANEL_DURATION_MS: '6000', GENERATION_CONCURRENCY: '5', FAL_KEY: 'test-secret' });
    expect(env.PANEL_DURATION_MS).toBe(6000);
    expect(env.GENERATION_CONCURRENCY).toBe(5);
    expect(env.FAL_KEY).toBe('test-secret');
  });

  it('names every invalid variable', () => {
    expect(() => parseEnv({ PANEL_DURATION_MS: '-1', LOG_LEVEL: 'loud' }))
      .toThrow('Missing or invalid environment variables: PANEL_DURATION_MS, LOG_LEVEL');
  });
});

describe('CANONICAL_PROFILE', () => {
  it('is vertical 1080x1920 limited-range bt709', () => {
    expect(CANONICAL_PROFILE).toEqual({
      width: 1080, height: 1920, pixelFormat: 'yuv420p', colorSpace: 'bt709', colorRange: 'tv',
    });
  });
});
