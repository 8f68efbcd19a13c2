import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigManager } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let projectDir: string;
  let globalDir: string;
  let manager: ConfigManager;

  beforeEach(() => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'voicekit-config-test-'));
    projectDir = path.join(root, 'project');
    globalDir = path.join(root, 'global');
    fs.mkdirSync(projectDir);
    fs.mkdirSync(globalDir);
    manager = new ConfigManager(projectDir, globalDir);
  });

  afterEach(() => {
    fs.rmSync(path.dirname(projectDir), { recursive: true, force: true });
  });

  it('should fill defaults when no files exist', () => {
    const config = manager.load(undefined, {});

    expect(config.capture).toEqual({
      sampleRate: 16000,
      loopSeconds: 30,
      preRollSeconds: 0.5,
      maxRecordSeconds: 10,
      minRecordSeconds: 0.25,
      readinessAttempts: 200,
    });
    expect(config.resolver).toEqual({
      model: 'gpt-4o-mini',
      maxTokens: 4,
      temperature: 0,
      cacheHeuristicMatches: true,
    });
    expect(config.controller).toEqual({ tickIntervalMs: 16, cancelStale: false });
    expect(config.providers.openaiApiKey).toBeUndefined();
  });

  it('should layer project config over global config', () => {
    fs.writeFileSync(path.join(globalDir, 'config.yaml'), 'capture:\n  sampleRate: 44100\n  loopSeconds: 20\n');
    fs.writeFileSync(path.join(projectDir, '.voicekit.yaml'), 'capture:\n  loopSeconds: 10\n');

    const config = manager.load(undefined, {});
    expect(config.capture.sampleRate).toBe(44100);
    expect(config.capture.loopSeconds).toBe(10);
    expect(config.capture.preRollSeconds).toBe(0.5);
  });

  it('should apply env vars over files', () => {
    fs.writeFileSync(path.join(projectDir, '.voicekit.yaml'), 'resolver:\n  model: gpt-4o\n');

    const config = manager.load(undefined, {
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      VOICEKIT_MODEL: 'gpt-4.1-mini',
      VOICEKIT_SAMPLE_RATE: '48000',
    });

    expect(config.providers).toEqual({ openaiApiKey: 'test-secret', baseUrl: 'http://localhost:8080/v1' });
    expect(config.resolver.model).toBe('gpt-4.1-mini');
    expect(config.capture.sampleRate).toBe(48000);
  });

  it('should ignore a non-numeric sample rate env var', () => {
    const config = manager.load(undefined, { VOICEKIT_SAMPLE_RATE: 'fast' });
    expect(config.capture.sampleRate).toBe(16000);
  });

  it('should apply overrides last', () => {
    const config = manager.load({ controller: { cancelStale: true } }, { VOICEKIT_MODEL: 'gpt-4o' });
    expect(config.controller).toEqual({ tickIntervalMs: 16, cancelStale: true });
    expect(config.resolver.model).toBe('gpt-4o');
  });

  it('should reject values outside the schema', () => {
    expect(() => manager.load({ capture: { preRollSeconds: -1 } }, {})).toThrow(ConfigError);
  });

  it('should report malformed YAML as a ConfigError', () => {
    fs.writeFileSync(path.join(projectDir, '.voicekit.yaml'), 'capture: [unclosed\n');
    expect(() => manager.load(undefined, {})).toThrow(ConfigError);
  });

  it('should cache the loaded config for get()', () => {
    const loaded = manager.load({ ui: { verbose: true } }, {});
    expect(manager.get()).toBe(loaded);
  });

  it('should write a default global config that loads cleanly', () => {
    const written = manager.createDefaultConfig();

    expect(written).toBe(path.join(globalDir, 'config.yaml'));
    const config = manager.load(undefined, {});
    expect(config.capture.sampleRate).toBe(16000);
    expect(config.controller.cancelStale).toBe(false);
  });

  it('should not overwrite an existing global config', () => {
    fs.writeFileSync(path.join(globalDir, 'config.yaml'), 'capture:\n  loopSeconds: 5\n');
    manager.createDefaultConfig();
    expect(manager.load(undefined, {}).capture.loopSeconds).toBe(5);
  });
});
