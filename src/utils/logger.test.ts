import { describe, it, expect, vi, afterEach } from 'vitest';

const dotenvFiles = vi.hoisted(() => {
  const loaded: string[] = [];
  return { loaded };
});

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, existsSync: (path: string) => path.endsWith('.env') || actual.existsSync(path) };
});

vi.mock('dotenv', () => ({
  default: {
    config: (options: { path: string }) => {
      dotenvFiles.loaded.push(options.path);
      process.env.LOG_LEVEL = 'DEBUG';
      return { parsed: { LOG_LEVEL: 'DEBUG' } };
    },
  },
}));

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('takes its level from the .env file', async () => {
    vi.stubEnv('LOG_LEVEL', 'INFO');
    vi.stubEnv('DATABASE_PATH', './shop.db');
    vi.stubEnv('LLM_PROVIDER', 'ollama');
    vi.stubEnv('EMBEDDING_PROVIDER', 'ollama');

    const { logger } = await import('./logger.js');
    const { getConfig } = await import('../config.js');

    expect(dotenvFiles.loaded).toHaveLength(1);
    expect(dotenvFiles.loaded[0].endsWith('.env')).toBe(true);
    expect(logger.level).toBe('debug');
    expect(getConfig().LOG_LEVEL).toBe('DEBUG');
  });
});
