import { describe, it, expect, afterEach, vi } from 'vitest';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '@tally/shared/Types/errors.js';
import { expandHome, getConfig, loadConfig, resetConfig } from '../../src/config.js';

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfig();
});

describe('loadConfig', () => {
  it('falls back to defaults in the working directory', () => {
    expect(loadConfig({})).toEqual({
      logPath: resolve('adv_calc_logs.txt'),
      trianglePath: resolve('triangle.svg'),
      fractionResults: false,
      maxDenominator: 1000,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      TALLY_LOG_PATH: '/var/tmp/calc/log.txt',
      TALLY_TRIANGLE_PATH: '~/shapes/tri.svg',
      TALLY_FRACTION_RESULTS: 'YES',
      TALLY_MAX_DENOMINATOR: '64',
    });

    expect(config.logPath).toBe('/var/tmp/calc/log.txt');
    expect(config.trianglePath).toBe(join(homedir(), 'shapes', 'tri.svg'));
    expect(config.fractionResults).toBe(true);
    expect(config.maxDenominator).toBe(64);
  });

  it('understands the usual boolean spellings', () => {
    expect(loadConfig({ TALLY_FRACTION_RESULTS: '1' }).fractionResults).toBe(true);
    expect(loadConfig({ TALLY_FRACTION_RESULTS: 'no' }).fractionResults).toBe(false);
    expect(loadConfig({ TALLY_FRACTION_RESULTS: 'False' }).fractionResults).toBe(false);
  });

  it('throws ConfigurationError for bad values', () => {
    expect(() => loadConfig({ TALLY_FRACTION_RESULTS: 'maybe' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ TALLY_MAX_DENOMINATOR: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ TALLY_MAX_DENOMINATOR: 'ten' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ TALLY_LOG_PATH: '' })).toThrow(ConfigurationError);
  });
});

describe('expandHome', () => {
  it('only expands a leading tilde', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/a.txt')).toBe(`${homedir()}/a.txt`);
    expect(expandHome('a/~/b')).toBe('a/~/b');
  });
});

describe('getConfig', () => {
  it('caches until resetConfig', () => {
    vi.stubEnv('TALLY_MAX_DENOMINATOR', '50');
    const first = getConfig();
    expect(first.maxDenominator).toBe(50);

    vi.stubEnv('TALLY_MAX_DENOMINATOR', '60');
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().maxDenominator).toBe(60);
  });
});
