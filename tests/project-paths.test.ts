import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import {
  resolveLogicalPath,
  toLogicalPath,
  logicalAncestors,
  isEditorPath,
} from '../src/core/project-paths.js';

const ROOT = '/project';

describe('project-paths', () => {
  describe('resolveLogicalPath', () => {
    it('should join logical segments onto the project root', () => {
      expect(resolveLogicalPath(ROOT, 'Assets/_Framework/Ads/AdsManager.cs'))
        .toBe(join(ROOT, 'Assets', '_Framework', 'Ads', 'AdsManager.cs'));
    });
  });

  describe('toLogicalPath', () => {
    it('should convert an absolute path back to a / separated logical path', () => {
      const abs = join(ROOT, 'Assets', 'Scenes', 'SampleScene.scene.json');
      expect(toLogicalPath(ROOT, abs)).toBe('Assets/Scenes/SampleScene.scene.json');
    });
  });

  describe('logicalAncestors', () => {
    it('should list ancestors nearest first', () => {
      expect(logicalAncestors('Assets/_Framework/Ads/AdsConfig.asset')).toEqual([
        'Assets/_Framework/Ads',
        'Assets/_Framework',
        'Assets',
      ]);
    });

    it('should return nothing for a top-level path', () => {
      expect(logicalAncestors('Assets')).toEqual([]);
    });
  });

  describe('isEditorPath', () => {
    it('should detect files under an Editor folder at any depth', () => {
      expect(isEditorPath('Assets/_Framework/Editor/Build/BuildScript.cs')).toBe(true);
      expect(isEditorPath('Assets/Editor/Tool.cs')).toBe(true);
    });

    it('should not treat a file named Editor as an editor folder', () => {
      expect(isEditorPath('Assets/_Framework/Editor')).toBe(false);
      expect(isEditorPath('Assets/_Framework/Ads/AdsManager.cs')).toBe(false);
    });
  });
});
