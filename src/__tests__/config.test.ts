import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      openaiApiKey: undefined,
      openaiModel: 'gpt-4o-mini',
      outputDir: join(process.cwd(), 'outputs'),
      port: 3000
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key', OPENAI_MODEL: 'test-model', OUTPUT_DIR: '/tmp/out', PORT: '8080' });
    expect(config).toEqual({ openaiApiKey: 'test-key', openaiModel: 'test-model', outputDir: '/tmp/out', port: 8080 });
  });

  it('ignores a port that is not a positive integer', () => {
    expect(loadConfig({ PORT: 'eighty' }).port).toBe(3000);
    expect(loadConfig({ PORT: '-1' }).port).toBe(3000);
  });

  it('lets explicit overrides win', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-key' }, { openaiApiKey: 'cli-key' }).openaiApiKey).toBe('cli-key');
  });
});
