import { describe, it, expect, vi, beforeEach } from 'vitest';

const { load, search } = vi.hoisted(() => ({ load: vi.fn(), search: vi.fn() }));

vi.mock('lilconfig', () => ({
  lilconfig: () => ({ load, search }),
}));

import { ConfigError, loadConfig } from '../loader.js';
import { DEFAULT_CONFIG } from '../defaults.js';

beforeEach(() => {
  vi.clearAllMocks();
});

describe('loadConfig', () => {
  it('returns defaults when no config file is found', async () => {
    search.mockResolvedValue(null);

    await expect(loadConfig()).resolves.toEqual(DEFAULT_CONFIG);
    expect(load).not.toHaveBeenCalled();
  });

  it('loads an explicit path and applies defaults to missing keys', async () => {
    load.mockResolvedValue({
      filepath: '/proj/hidden-text-audit.config.mjs',
      config: { scanScope: 'all' },
    });

    const config = await loadConfig('/proj/hidden-text-audit.config.mjs');

    expect(load).toHaveBeenCalledWith('/proj/hidden-text-audit.config.mjs');
    expect(config.scanScope).toBe('all');
    expect(config.contrastThreshold).toBe(3.0);
  });

  it('names the config file and the failing key', async () => {
    search.mockResolvedValue({
      filepath: '/proj/.hidden-text-auditrc.json',
      config: { contrastThreshold: 2, invisibleContrastThreshold: 2.5 },
    });

    const error = await loadConfig().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      filePath: '/proj/.hidden-text-auditrc.json',
      message:
        '/proj/.hidden-text-auditrc.json: invalid config ' +
        '(invisibleContrastThreshold: invisibleContrastThreshold must not exceed contrastThreshold)',
    });
  });

  it('reports type errors the same way', async () => {
    search.mockResolvedValue({ filepath: '/proj/package.json', config: { format: 'xml' } });

    await expect(loadConfig()).rejects.toThrow(/^\/proj\/package\.json: invalid config \(format: /);
  });
});
