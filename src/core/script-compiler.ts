import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  EDITOR_ASSEMBLY,
  RUNTIME_ASSEMBLY,
  type AssemblyName,
  type TypeHandle,
  type TypeKind,
} from '../types/asset.js';
import { ASSETS_ROOT, isEditorPath, resolveLogicalPath, toLogicalPath } from './project-paths.js';

/** 이름만으로 찾을 수 있는 엔진 내장 타입 */
export const BUILTIN_TYPES: ReadonlyArray<Omit<TypeHandle, 'scope'>> = [
  { name: 'GameObject', kind: 'class' },
  { name: 'Transform', kind: 'class' },
  { name: 'Camera', kind: 'class' },
  { name: 'Light', kind: 'class' },
  { name: 'AudioSource', kind: 'class' },
  { name: 'AudioListener', kind: 'class' },
  { name: 'MonoBehaviour', kind: 'class' },
  { name: 'ScriptableObject', kind: 'class' },
];

const DECLARATION_PATTERN =
  /^[ \t]*(?:(?:public|internal|private|protected|static|sealed|abstract|partial)\s+)*(class|struct|enum)\s+([A-Za-z_]\w*)(?:\s*:\s*([A-Za-z_][\w.]*))?/gm;

export interface CompileReport {
  generation: number;
  sourceCount: number;
  typeCount: Record<AssemblyName, number>;
}

/**
 * 호스트 스크립트 컴파일러.
 * compile() 시점에 디스크에 있던 소스의 타입 선언만 조회 가능하며,
 * 그 뒤에 기록된 소스는 다음 compile() 까지 보이지 않는다.
 */
export class ScriptCompiler {
  private assemblies = new Map<AssemblyName, Map<string, TypeHandle>>();
  private builtins = new Map<string, TypeHandle>();
  private generation = 0;

  constructor(
    private readonly projectRoot: string,
    builtinTypes: ReadonlyArray<Omit<TypeHandle, 'scope'>> = BUILTIN_TYPES,
  ) {
    for (const type of builtinTypes) {
      this.builtins.set(type.name, { ...type, scope: 'global' });
    }
  }

  compile(): CompileReport {
    const next = new Map<AssemblyName, Map<string, TypeHandle>>([
      [RUNTIME_ASSEMBLY, new Map()],
      [EDITOR_ASSEMBLY, new Map()],
    ]);

    const sources = this.collectSources();
    for (const logicalPath of sources) {
      const assembly: AssemblyName = isEditorPath(logicalPath) ? EDITOR_ASSEMBLY : RUNTIME_ASSEMBLY;
      const content = readFileSync(resolveLogicalPath(this.projectRoot, logicalPath), 'utf-8');
      const types = next.get(assembly);
      if (!types) continue;
      for (const handle of parseDeclarations(content, assembly, logicalPath)) {
        // 같은 단위 안의 중복 선언은 먼저 발견된 쪽을 유지
        if (!types.has(handle.name)) types.set(handle.name, handle);
      }
    }

    this.assemblies = next;
    this.generation++;
    return {
      generation: this.generation,
      sourceCount: sources.length,
      typeCount: {
        [RUNTIME_ASSEMBLY]: next.get(RUNTIME_ASSEMBLY)?.size ?? 0,
        [EDITOR_ASSEMBLY]: next.get(EDITOR_ASSEMBLY)?.size ?? 0,
      },
    };
  }

  /** 컴파일된 어셈블리에서 조회 */
  findInAssembly(assembly: AssemblyName, name: string): TypeHandle | null {
    return this.assemblies.get(assembly)?.get(name) ?? null;
  }

  /** 어셈블리 한정 없는 전역 조회 (엔진 내장 타입) */
  findGlobal(name: string): TypeHandle | null {
    return this.builtins.get(name) ?? null;
  }

  get compileCount(): number {
    return this.generation;
  }

  private collectSources(): string[] {
    const root = resolveLogicalPath(this.projectRoot, ASSETS_ROOT);
    if (!existsSync(root)) return [];
    const found: string[] = [];
    const walk = (dirPath: string): void => {
      const entries = readdirSync(dirPath, { withFileTypes: true })
        .sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const fullPath = join(dirPath, entry.name);
        if (entry.isDirectory()) {
          walk(fullPath);
        } else if (entry.name.endsWith('.cs')) {
          found.push(toLogicalPath(this.projectRoot, fullPath));
        }
      }
    };
    walk(root);
    return found;
  }
}

export function parseDeclarations(content: string, assembly: AssemblyName, sourcePath: string): TypeHandle[] {
  const handles: TypeHandle[] = [];
  for (const match of content.matchAll(DECLARATION_PATTERN)) {
    const [, kind, name, baseType] = match;
    if (!isTypeKind(kind) || !name) continue;
    handles.push({
      name,
      kind,
      scope: assembly,
      ...(baseType && kind === 'class' ? { baseType } : {}),
      sourcePath,
    });
  }
  return handles;
}

function isTypeKind(value: string | undefined): value is TypeKind {
  return value === 'class' || value === 'struct' || value === 'enum';
}
