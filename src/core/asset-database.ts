import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { AssetFileSchema, type AssetHandle } from '../types/asset.js';
import { ASSETS_ROOT, logicalAncestors, resolveLogicalPath, toLogicalPath } from './project-paths.js';
import { safeWriteFile } from './file-ops.js';

/**
 * 호스트 에셋 인덱스.
 * 인덱스에 등록된 경로만 "에디터가 알고 있는" 경로이며,
 * 설정 에셋은 .asset 경로에 { type, fields } JSON 으로 영속화된다.
 */
export class AssetDatabase {
  private index = new Set<string>();
  private loaded = new Map<string, AssetHandle>();
  private dirty = new Set<string>();
  private importLog: string[] = [];

  constructor(private readonly projectRoot: string) {}

  /** 한 경로(와 그 조상 폴더)만 인덱스에 반영 */
  importAsset(logicalPath: string): void {
    this.importLog.push(logicalPath);
    this.index.add(logicalPath);
    for (const ancestor of logicalAncestors(logicalPath)) {
      this.index.add(ancestor);
    }
  }

  /** Assets/ 전체 재스캔 */
  refresh(): number {
    const next = new Set<string>();
    const root = resolveLogicalPath(this.projectRoot, ASSETS_ROOT);
    if (existsSync(root)) {
      next.add(ASSETS_ROOT);
      this.scan(root, next);
    }
    this.index = next;
    return next.size;
  }

  isIndexed(logicalPath: string): boolean {
    return this.index.has(logicalPath);
  }

  /** importAsset 호출 이력 (호출 순서대로) */
  importedPaths(): string[] {
    return [...this.importLog];
  }

  /**
   * 경로의 에셋을 읽는다. 없으면 null.
   * 파일이 있는데 형식이 깨져 있으면 프로젝트 손상으로 보고 예외를 던진다.
   */
  loadAssetAtPath(logicalPath: string): AssetHandle | null {
    const cached = this.loaded.get(logicalPath);
    if (cached) return cached;

    const fullPath = resolveLogicalPath(this.projectRoot, logicalPath);
    if (!existsSync(fullPath)) return null;

    const parsed = AssetFileSchema.safeParse(JSON.parse(readFileSync(fullPath, 'utf-8')));
    if (!parsed.success) {
      throw new Error(`에셋 형식 오류: ${logicalPath} (${parsed.error.issues[0]?.message ?? 'unknown'})`);
    }
    const handle: AssetHandle = { path: logicalPath, type: parsed.data.type, fields: parsed.data.fields };
    this.loaded.set(logicalPath, handle);
    return handle;
  }

  /** 새 에셋 등록. saveAssets() 전까지 디스크에 쓰이지 않는다 */
  createAsset(type: string, fields: Record<string, unknown>, logicalPath: string): AssetHandle {
    const handle: AssetHandle = { path: logicalPath, type, fields };
    this.loaded.set(logicalPath, handle);
    this.dirty.add(logicalPath);
    this.importAsset(logicalPath);
    return handle;
  }

  setDirty(handle: AssetHandle): void {
    this.loaded.set(handle.path, handle);
    this.dirty.add(handle.path);
  }

  isDirty(logicalPath: string): boolean {
    return this.dirty.has(logicalPath);
  }

  /** 변경된 에셋을 디스크로 flush. 기록한 경로 목록 반환 */
  saveAssets(): string[] {
    const saved: string[] = [];
    for (const logicalPath of this.dirty) {
      const handle = this.loaded.get(logicalPath);
      if (!handle) continue;
      const body = { type: handle.type, fields: handle.fields };
      safeWriteFile(resolveLogicalPath(this.projectRoot, logicalPath), JSON.stringify(body, null, 2) + '\n');
      saved.push(logicalPath);
    }
    this.dirty.clear();
    return saved;
  }

  private scan(dirPath: string, into: Set<string>): void {
    for (const entry of readdirSync(dirPath, { withFileTypes: true })) {
      const fullPath = join(dirPath, entry.name);
      into.add(toLogicalPath(this.projectRoot, fullPath));
      if (entry.isDirectory()) {
        this.scan(fullPath, into);
      }
    }
  }
}
