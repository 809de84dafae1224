import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ScriptCompiler, parseDeclarations } from '../src/core/script-compiler.js';
import { resolveType } from '../src/core/type-resolver.js';
import { EDITOR_ASSEMBLY, RUNTIME_ASSEMBLY } from '../src/types/asset.js';

function writeSource(root: string, logicalPath: string, content: string): void {
  const segments = logicalPath.split('/');
  mkdirSync(join(root, ...segments.slice(0, -1)), { recursive: true });
  writeFileSync(join(root, ...segments), content);
}

describe('parseDeclarations', () => {
  it('should pick up classes, structs and enums with modifiers', () => {
    const source = [
      'using UnityEngine;',
      'public enum AdsEnvironment { Dev, Prod }',
      'public class AdsConfig : ScriptableObject',
      '{',
      '    public struct Slot { }',
      '}',
      'public static class Helpers { }',
    ].join('\n');

    const handles = parseDeclarations(source, RUNTIME_ASSEMBLY, 'Assets/Ads/AdsConfig.cs');

    expect(handles.map(h => `${h.kind}:${h.name}`)).toEqual([
      'enum:AdsEnvironment',
      'class:AdsConfig',
      'struct:Slot',
      'class:Helpers',
    ]);
    expect(handles[1]).toEqual({
      name: 'AdsConfig',
      kind: 'class',
      scope: RUNTIME_ASSEMBLY,
      baseType: 'ScriptableObject',
      sourcePath: 'Assets/Ads/AdsConfig.cs',
    });
  });

  it('should ignore declarations inside line comments', () => {
    expect(parseDeclarations('// public class Ghost {}', RUNTIME_ASSEMBLY, 'a.cs')).toEqual([]);
  });
});

describe('ScriptCompiler', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'framework-compiler-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should split sources into runtime and editor assemblies', () => {
    writeSource(testDir, 'Assets/Game/Player.cs', 'public class Player : MonoBehaviour {}');
    writeSource(testDir, 'Assets/Game/Editor/PlayerInspector.cs', 'public class PlayerInspector {}');

    const compiler = new ScriptCompiler(testDir);
    const report = compiler.compile();

    expect(report).toEqual({
      generation: 1,
      sourceCount: 2,
      typeCount: { [RUNTIME_ASSEMBLY]: 1, [EDITOR_ASSEMBLY]: 1 },
    });
    expect(compiler.findInAssembly(RUNTIME_ASSEMBLY, 'Player')?.sourcePath).toBe('Assets/Game/Player.cs');
    expect(compiler.findInAssembly(RUNTIME_ASSEMBLY, 'PlayerInspector')).toBeNull();
    expect(compiler.findInAssembly(EDITOR_ASSEMBLY, 'PlayerInspector')?.scope).toBe(EDITOR_ASSEMBLY);
  });

  it('should not see sources written after the last compile', () => {
    const compiler = new ScriptCompiler(testDir);
    compiler.compile();

    writeSource(testDir, 'Assets/Late.cs', 'public class Late {}');
    expect(compiler.findInAssembly(RUNTIME_ASSEMBLY, 'Late')).toBeNull();

    compiler.compile();
    expect(compiler.findInAssembly(RUNTIME_ASSEMBLY, 'Late')?.name).toBe('Late');
    expect(compiler.compileCount).toBe(2);
  });

  it('should compile an empty project without an Assets folder', () => {
    const report = new ScriptCompiler(testDir).compile();
    expect(report.sourceCount).toBe(0);
  });
});

describe('resolveType', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'framework-resolver-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should prefer the runtime assembly over the editor assembly', () => {
    writeSource(testDir, 'Assets/Shared.cs', 'public class Shared {}');
    writeSource(testDir, 'Assets/Editor/Shared.cs', 'public class Shared {}');
    const compiler = new ScriptCompiler(testDir);
    compiler.compile();

    expect(resolveType({ compiler }, 'Shared')?.scope).toBe(RUNTIME_ASSEMBLY);
  });

  it('should find editor-only types in the second scope', () => {
    writeSource(testDir, 'Assets/_Framework/Editor/Build/BuildConfig.cs', 'public class BuildConfig : ScriptableObject {}');
    const compiler = new ScriptCompiler(testDir);
    compiler.compile();

    expect(resolveType({ compiler }, 'BuildConfig')?.scope).toBe(EDITOR_ASSEMBLY);
  });

  it('should fall back to engine built-ins', () => {
    const compiler = new ScriptCompiler(testDir);
    compiler.compile();

    expect(resolveType({ compiler }, 'AudioSource')).toEqual({ name: 'AudioSource', kind: 'class', scope: 'global' });
  });

  it('should return null for a type that has not been compiled', () => {
    const compiler = new ScriptCompiler(testDir);
    compiler.compile();

    expect(resolveType({ compiler }, 'AdsManager')).toBeNull();
  });
});
