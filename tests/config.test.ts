import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  configExists,
  createConfig,
  loadConfig,
  loadOrCreateConfig,
  saveConfig,
  updateFileRecord,
} from '../src/core/config.js';
import { CONFIG_FILENAME } from '../src/types/config.js';
import { DEFAULT_SCENE_PATH } from '../src/core/project-paths.js';

describe('config', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'framework-config-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should create an empty config for the default scene', () => {
    const config = createConfig();
    expect(config.scenePath).toBe(DEFAULT_SCENE_PATH);
    expect(config.modules).toEqual([]);
    expect(config.files).toEqual({});
    expect(config.version).toBe('1.0.0');
  });

  it('should round-trip through the config file', () => {
    const config = createConfig('Assets/Scenes/Main.scene.json');
    config.modules.push('ads');
    updateFileRecord(config, 'Assets/_Framework/Ads/AdsManager.cs', 'ads', '1.0.0', 'sha256:test');

    saveConfig(testDir, config);

    expect(configExists(testDir)).toBe(true);
    expect(loadConfig(testDir)).toEqual(config);
    expect(readFileSync(join(testDir, CONFIG_FILENAME), 'utf-8').endsWith('}\n')).toBe(true);
  });

  it('should return null for a missing or malformed config', () => {
    expect(loadConfig(testDir)).toBeNull();

    writeFileSync(join(testDir, CONFIG_FILENAME), '{ not json');
    expect(loadConfig(testDir)).toBeNull();

    writeFileSync(join(testDir, CONFIG_FILENAME), JSON.stringify({ version: '1.0.0' }));
    expect(loadConfig(testDir)).toBeNull();
  });

  it('should let an explicit scene path override the stored one', () => {
    saveConfig(testDir, createConfig());

    expect(loadOrCreateConfig(testDir).scenePath).toBe(DEFAULT_SCENE_PATH);
    expect(loadOrCreateConfig(testDir, 'Assets/Scenes/Menu.scene.json').scenePath).toBe('Assets/Scenes/Menu.scene.json');
  });
});
