import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, mkdirSync, writeFileSync, readFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AssetDatabase } from '../src/core/asset-database.js';
import { computeHash, ensureFolder, fileExists, folderExists, writeFile } from '../src/core/file-ops.js';
import { logger } from '../src/utils/logger.js';

describe('file-ops', () => {
  let testDir: string;
  let ctx: { projectRoot: string; assets: AssetDatabase };

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'framework-fileops-test-'));
    ctx = { projectRoot: testDir, assets: new AssetDatabase(testDir) };
    logger.clear();
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('computeHash', () => {
    it('should prefix the sha256 hex digest', () => {
      expect(computeHash('')).toBe('sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });
  });

  describe('ensureFolder', () => {
    it('should create missing ancestors and import the folder once', () => {
      ensureFolder(ctx, 'Assets/_Framework/Ads');

      expect(folderExists(ctx, 'Assets/_Framework/Ads')).toBe(true);
      expect(ctx.assets.importedPaths()).toEqual(['Assets/_Framework/Ads']);
      expect(ctx.assets.isIndexed('Assets/_Framework')).toBe(true);
      expect(ctx.assets.isIndexed('Assets')).toBe(true);
    });

    it('should do nothing when the folder already exists', () => {
      mkdirSync(join(testDir, 'Assets', 'Ads'), { recursive: true });

      ensureFolder(ctx, 'Assets/Ads');

      expect(ctx.assets.importedPaths()).toEqual([]);
    });
  });

  describe('writeFile', () => {
    it('should write a missing file verbatim and log a create action', () => {
      const written = writeFile(ctx, 'Assets/Ads/AdsManager.cs', 'class AdsManager {}\n');

      expect(written).toBe(true);
      expect(readFileSync(join(testDir, 'Assets', 'Ads', 'AdsManager.cs'), 'utf-8')).toBe('class AdsManager {}\n');
      expect(logger.lines()).toEqual(['  + Assets/Ads/AdsManager.cs']);
    });

    it('should never overwrite an existing file', () => {
      mkdirSync(join(testDir, 'Assets'), { recursive: true });
      writeFileSync(join(testDir, 'Assets', 'Custom.cs'), '// edited by hand');

      const written = writeFile(ctx, 'Assets/Custom.cs', '// template');

      expect(written).toBe(false);
      expect(readFileSync(join(testDir, 'Assets', 'Custom.cs'), 'utf-8')).toBe('// edited by hand');
      expect(logger.lines()).toEqual(['  - Assets/Custom.cs']);
    });

    it('should not touch the asset index', () => {
      writeFile(ctx, 'Assets/Note.cs', '');

      expect(fileExists(ctx, 'Assets/Note.cs')).toBe(true);
      expect(existsSync(join(testDir, 'Assets', 'Note.cs'))).toBe(true);
      expect(ctx.assets.importedPaths()).toEqual([]);
    });
  });
});
