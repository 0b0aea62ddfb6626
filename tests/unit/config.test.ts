import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadSmokeConfig, chatCompletionsUrl } from '../../src/config/Config';
import { createLogger } from '../../src/logging';
import { ConfigError } from '../../src/smoke/errors';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'smoke-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('loadSmokeConfig', () => {
  it('falls back to the local server defaults', () => {
    expect(loadSmokeConfig({ cwd: dir, env: {} })).toEqual({
      apiBase: 'http://localhost:8000',
      url: 'http://localhost:8000/v1/chat/completions',
      model: 'gemma-3-1b-it',
      apiKey: undefined,
      logLevel: 'info',
      source: undefined
    });
  });

  it('reads smoke.config.yaml from the working directory', () => {
    const file = path.join(dir, 'smoke.config.yaml');
    fs.writeFileSync(file, 'apiBase: http://10.0.0.5:9000/\nmodel: other-model\napiKey: test-secret\n', 'utf-8');

    const config = loadSmokeConfig({ cwd: dir, env: {} });

    expect(config.url).toBe('http://10.0.0.5:9000/v1/chat/completions');
    expect(config.model).toBe('other-model');
    expect(config.apiKey).toBe('test-secret');
    expect(config.source).toBe(file);
  });

  it('lets environment variables override the file', () => {
    fs.writeFileSync(path.join(dir, 'smoke.config.yaml'), 'model: file-model\nlogLevel: warn\n', 'utf-8');

    const config = loadSmokeConfig({
      cwd: dir,
      env: { CHAT_API_BASE: 'https://llm.internal', CHAT_MODEL: 'env-model', LOG_LEVEL: 'debug' }
    });

    expect(config.url).toBe('https://llm.internal/v1/chat/completions');
    expect(config.model).toBe('env-model');
    expect(config.logLevel).toBe('debug');
  });

  it('ignores blank environment values', () => {
    const config = loadSmokeConfig({ cwd: dir, env: { CHAT_MODEL: '  ', CHAT_API_KEY: '' } });
    expect(config.model).toBe('gemma-3-1b-it');
    expect(config.apiKey).toBeUndefined();
  });

  it('prefers SMOKE_CONFIG over files in the working directory', () => {
    fs.writeFileSync(path.join(dir, 'smoke.config.yaml'), 'model: cwd-model\n', 'utf-8');
    const custom = path.join(dir, 'custom.json');
    fs.writeFileSync(custom, JSON.stringify({ model: 'custom-model' }), 'utf-8');

    const config = loadSmokeConfig({ cwd: dir, env: { SMOKE_CONFIG: custom } });

    expect(config.model).toBe('custom-model');
    expect(config.source).toBe(custom);
  });

  it('resolves a relative SMOKE_CONFIG against the working directory', () => {
    fs.writeFileSync(path.join(dir, 'custom.yaml'), 'model: rel-model\n', 'utf-8');

    const config = loadSmokeConfig({ cwd: dir, env: { SMOKE_CONFIG: 'custom.yaml' } });

    expect(config.model).toBe('rel-model');
    expect(config.source).toBe(path.join(dir, 'custom.yaml'));
  });

  it('resolves a relative configPath against the working directory', () => {
    fs.writeFileSync(path.join(dir, 'other.json'), '{"model":"path-model"}', 'utf-8');

    expect(loadSmokeConfig({ cwd: dir, env: {}, configPath: 'other.json' }).model).toBe('path-model');
  });

  it('fails when an explicitly named config file is missing', () => {
    fs.writeFileSync(path.join(dir, 'smoke.config.yaml'), 'model: cwd-model\n', 'utf-8');
    const missing = path.join(dir, 'typo.yaml');

    expect(() => loadSmokeConfig({ cwd: dir, env: { SMOKE_CONFIG: missing } })).toThrow(ConfigError);
    expect(() => loadSmokeConfig({ cwd: dir, env: { SMOKE_CONFIG: missing } })).toThrow(`config file not found: ${missing}`);
  });

  it('falls back to the VLLM_ endpoint variables', () => {
    const config = loadSmokeConfig({ cwd: dir, env: { VLLM_API_BASE: 'http://127.0.0.1:8001', VLLM_API_KEY: 'not-needed' } });
    expect(config.url).toBe('http://127.0.0.1:8001/v1/chat/completions');
    expect(config.apiKey).toBe('not-needed');
  });

  it('prefers CHAT_ variables over VLLM_ ones', () => {
    const config = loadSmokeConfig({
      cwd: dir,
      env: { CHAT_API_BASE: 'http://127.0.0.1:9000', VLLM_API_BASE: 'http://127.0.0.1:8001', CHAT_API_KEY: 'test-secret', VLLM_API_KEY: 'other' }
    });
    expect(config.url).toBe('http://127.0.0.1:9000/v1/chat/completions');
    expect(config.apiKey).toBe('test-secret');
  });

  it('skips an unreadable file with a warning and tries the next one', () => {
    const bad = path.join(dir, 'smoke.config.yaml');
    fs.writeFileSync(bad, 'model: 42\n', 'utf-8');
    fs.writeFileSync(path.join(dir, 'smoke.config.json'), '{"model":"json-model"}', 'utf-8');
    const lines: string[] = [];
    const logger = createLogger('warn', { write: (msg: string) => { lines.push(msg); } });

    const config = loadSmokeConfig({ cwd: dir, env: {}, logger });

    expect(config.model).toBe('json-model');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ msg: 'skipping unreadable config file', path: bad });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadSmokeConfig({ cwd: dir, env: { LOG_LEVEL: 'loud' } })).toThrow('unknown log level: loud');
  });
});

describe('chatCompletionsUrl', () => {
  it('appends the completions path once', () => {
    expect(chatCompletionsUrl('http://127.0.0.1:8000//')).toBe('http://127.0.0.1:8000/v1/chat/completions');
  });

  it('rejects values that are not http URLs', () => {
    expect(() => chatCompletionsUrl('not a url')).toThrow(ConfigError);
    expect(() => chatCompletionsUrl('ftp://models.local')).toThrow('apiBase must use http or https: ftp://models.local');
  });
});
