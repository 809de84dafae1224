import { existsSync, readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { SceneFileSchema, type SceneFile, type SceneObject } from '../types/scene.js';
import { resolveLogicalPath } from './project-paths.js';
import { safeWriteFile } from './file-ops.js';

/**
 * 활성 씬. 루트 오브젝트만 다루며, 같은 이름은 루트에 하나만 있다고 가정한다.
 */
export class Scene {
  private objects: SceneObject[];
  private nextId: number;
  private dirty = false;

  constructor(
    readonly name: string,
    readonly path: string,
    data?: SceneFile,
  ) {
    this.objects = data ? data.objects.map(o => ({ ...o, components: [...o.components] })) : [];
    this.nextId = data?.nextId ?? 1;
  }

  get roots(): readonly SceneObject[] {
    return this.objects;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  findRoot(name: string): SceneObject | null {
    return this.objects.find(o => o.name === name) ?? null;
  }

  /** 부모 없는 루트 오브젝트 생성 */
  createRoot(name: string): SceneObject {
    const obj: SceneObject = { id: this.nextId++, name, components: [] };
    this.objects.push(obj);
    return obj;
  }

  addComponent(obj: SceneObject, typeName: string): void {
    obj.components.push(typeName);
  }

  removeRoot(id: number): boolean {
    const before = this.objects.length;
    this.objects = this.objects.filter(o => o.id !== id);
    return this.objects.length !== before;
  }

  markDirty(): void {
    this.dirty = true;
  }

  markSaved(): void {
    this.dirty = false;
  }

  toJSON(): SceneFile {
    return { name: this.name, nextId: this.nextId, objects: this.objects };
  }
}

/** 씬 파일 로드/저장 */
export class SceneManager {
  private current: Scene;

  constructor(private readonly projectRoot: string, scenePath: string) {
    this.current = this.open(scenePath);
  }

  get active(): Scene {
    return this.current;
  }

  /** 파일이 없으면 빈 씬으로 연다 (저장 전까지 디스크에 쓰지 않음) */
  open(scenePath: string): Scene {
    const fullPath = resolveLogicalPath(this.projectRoot, scenePath);
    const name = basename(scenePath).replace(/\.scene\.json$/, '');
    if (!existsSync(fullPath)) {
      this.current = new Scene(name, scenePath);
      return this.current;
    }
    const parsed = SceneFileSchema.safeParse(JSON.parse(readFileSync(fullPath, 'utf-8')));
    if (!parsed.success) {
      throw new Error(`씬 형식 오류: ${scenePath} (${parsed.error.issues[0]?.message ?? 'unknown'})`);
    }
    this.current = new Scene(parsed.data.name, scenePath, parsed.data);
    return this.current;
  }

  /** dirty 상태인 경우에만 저장. 저장했으면 true */
  saveIfDirty(): boolean {
    const scene = this.current;
    if (!scene.isDirty) return false;
    safeWriteFile(
      resolveLogicalPath(this.projectRoot, scene.path),
      JSON.stringify(scene.toJSON(), null, 2) + '\n',
    );
    scene.markSaved();
    return true;
  }
}
