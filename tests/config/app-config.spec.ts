import { afterEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  getConfigPath,
  mergeWithDefaults,
  parseToolCallMode,
  readConfig,
} from '../../src/config/app-config.js';

vi.mock('fs/promises');

function missingFile(): Error {
  return Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
}

describe('mergeWithDefaults', () => {
  it('returns the defaults for an empty or non-object document', () => {
    expect(mergeWithDefaults({})).toEqual(DEFAULT_CONFIG);
    expect(mergeWithDefaults(null)).toEqual(DEFAULT_CONFIG);
    expect(mergeWithDefaults([1, 2])).toEqual(DEFAULT_CONFIG);
  });

  it('takes valid fields and keeps the default for invalid ones', () => {
    const config = mergeWithDefaults({
      host: { command: 'node', args: ['host.js', 7], env: { MODE: 'test', BAD: 1 } },
      model: { provider: 'openai-compatible', timeoutMs: -5, model: 'gpt-test' },
      orchestration: { toolCallMode: 'inline', maxToolRounds: 0, historyWindow: 'many', inlineFinalization: 'follow-up' },
      telegram: { allowFrom: [42, '43', 1.5] },
      logging: { enabled: 'yes' },
    });

    expect(config.host).toEqual({ command: 'node', args: ['host.js'], env: { MODE: 'test' } });
    expect(config.model).toEqual({ ...DEFAULT_CONFIG.model, provider: 'openai-compatible', model: 'gpt-test' });
    expect(config.orchestration).toEqual({
      toolCallMode: 'inline',
      maxToolRounds: 0,
      historyWindow: 6,
      maxHistoryEntries: 20,
      inlineFinalization: 'follow-up',
    });
    expect(config.telegram.allowFrom).toEqual([42]);
    expect(config.logging.enabled).toBe(true);
  });
});

describe('applyEnvOverrides', () => {
  it('lets set variables win and ignores blank or invalid ones', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      OLLAMA_BASE_URL: 'http://model-host:11434',
      MODEL_NAME: '  ',
      MODEL_PROVIDER: 'unknown',
      MODEL_TIMEOUT_MS: '5000',
      TOOL_CALL_MODE: 'inline',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TOOLBRIDGE_LOG_DIR: '/tmp/toolbridge-logs',
    });

    expect(config.model).toEqual({
      ...DEFAULT_CONFIG.model,
      baseUrl: 'http://model-host:11434',
      timeoutMs: 5000,
    });
    expect(config.orchestration.toolCallMode).toBe('inline');
    expect(config.telegram.botToken).toBe('test-token');
    expect(config.logging.dir).toBe('/tmp/toolbridge-logs');
    expect(DEFAULT_CONFIG.orchestration.toolCallMode).toBe('structured');
  });
});

describe('getConfigPath', () => {
  it('prefers the explicit path, then the environment, then the working directory', () => {
    expect(getConfigPath('custom.json', { TOOLBRIDGE_CONFIG_PATH: 'env.json' })).toBe(path.resolve('custom.json'));
    expect(getConfigPath(undefined, { TOOLBRIDGE_CONFIG_PATH: 'env.json' })).toBe(path.resolve('env.json'));
    expect(getConfigPath(undefined, {})).toBe(path.resolve('toolbridge.json'));
  });
});

describe('readConfig', () => {
  afterEach(() => {
    vi.mocked(fs.readFile).mockReset();
  });

  it('falls back to the defaults when the file is missing', async () => {
    vi.mocked(fs.readFile).mockRejectedValue(missingFile());

    await expect(readConfig(undefined, {})).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('merges the file, then applies the environment', async () => {
    vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify({ model: { model: 'from-file', baseUrl: 'http://file-host:11434' } }));

    const config = await readConfig('toolbridge.json', { MODEL_NAME: 'from-env' });

    expect(config.model.model).toBe('from-env');
    expect(config.model.baseUrl).toBe('http://file-host:11434');
    expect(fs.readFile).toHaveBeenCalledWith(path.resolve('toolbridge.json'), 'utf-8');
  });

  it('reports a file that is not valid JSON', async () => {
    vi.mocked(fs.readFile).mockResolvedValue('{ "model": ');

    await expect(readConfig('broken.json', {})).rejects.toThrow(`Failed to parse config file at ${path.resolve('broken.json')}:`);
  });
});

describe('parseToolCallMode', () => {
  it('accepts only the two modes', () => {
    expect(parseToolCallMode('inline')).toBe('inline');
    expect(parseToolCallMode('structured')).toBe('structured');
    expect(parseToolCallMode('auto')).toBeNull();
  });
});
