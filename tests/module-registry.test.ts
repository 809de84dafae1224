import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createModuleRegistry,
  getModuleNames,
  loadManifest,
  requireConfigAssetPath,
  resolveModules,
} from '../src/core/module-registry.js';
import { openEditorHost } from '../src/core/editor-host.js';
import { logger } from '../src/utils/logger.js';

describe('module-registry', () => {
  it('should list modules in dashboard order', () => {
    expect(getModuleNames()).toEqual(['auth', 'ads', 'build', 'sound-haptics', 'settings-links', 'firebase']);
  });

  it('should keep every target file under its module folder', () => {
    for (const mod of loadManifest().modules) {
      for (const file of mod.files) {
        expect(file.destination.startsWith(`${mod.folder}/`)).toBe(true);
      }
      expect(mod.files.map(f => f.destination)).toContain(mod.primaryFile);
    }
  });

  it('should sort requested names into catalog order and split unknown ones', () => {
    const { modules, unknown } = resolveModules(['firebase', 'nope', 'ads']);
    expect(modules.map(m => m.name)).toEqual(['ads', 'firebase']);
    expect(unknown).toEqual(['nope']);
  });

  it('should expose config asset paths and reject modules without one', () => {
    expect(requireConfigAssetPath('ads')).toBe('Assets/_Framework/Ads/AdsConfig.asset');
    expect(() => requireConfigAssetPath('auth')).toThrow('설정 에셋이 정의되지 않은 모듈: auth');
  });

  describe('createModuleRegistry', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = mkdtempSync(join(tmpdir(), 'framework-registry-test-'));
      logger.clear();
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should build frozen descriptors bound to the host', () => {
      const registry = createModuleRegistry(openEditorHost(testDir));
      const ads = registry.find(d => d.name === 'ads');

      expect(registry).toHaveLength(6);
      expect(Object.isFrozen(ads)).toBe(true);
      expect(ads?.title).toBe('Ads');
      expect(ads && [...ads.targetFiles]).toEqual([
        'Assets/_Framework/Ads/AdsConfig.cs',
        'Assets/_Framework/Ads/AdsManager.cs',
      ]);
    });

    it('should report installation from the primary file on every call', () => {
      const registry = createModuleRegistry(openEditorHost(testDir));
      const auth = registry.find(d => d.name === 'auth');

      expect(auth?.isInstalled()).toBe(false);
      const result = auth?.install();
      expect(result?.created).toEqual(['Assets/_Framework/Authentication/AuthManager.cs']);
      expect(auth?.isInstalled()).toBe(true);
    });
  });
});
