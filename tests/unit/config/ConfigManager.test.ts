/**
 * ConfigManager unit tests
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConfigManager, getConfig, resetConfig } from '../../../src/config/ConfigManager.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('should use defaults', () => {
    vi.stubEnv('DNSSYNC_STRICT', '');
    vi.stubEnv('DNSSYNC_DEFAULT_TTL', '');

    const config = new ConfigManager();

    expect(config.app.strict).toBe(false);
    expect(config.app.defaultTtl).toBe(3600);
  });

  it('should read settings from the environment', () => {
    vi.stubEnv('DNSSYNC_STRICT', 'true');
    vi.stubEnv('DNSSYNC_DEFAULT_TTL', '600');
    vi.stubEnv('OS_CLIENT_CONFIG_FILE', '/etc/dnssync/clouds.yaml');

    const config = new ConfigManager();

    expect(config.app.strict).toBe(true);
    expect(config.app.defaultTtl).toBe(600);
    expect(config.app.cloudsFile).toBe('/etc/dnssync/clouds.yaml');
  });

  it('should reject an unknown log level', () => {
    vi.stubEnv('LOG_LEVEL', 'chatty');

    expect(() => new ConfigManager()).toThrow(ConfigError);
  });

  it('should cache the instance until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
