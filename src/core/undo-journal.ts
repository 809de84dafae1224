import type { SceneObject } from '../types/scene.js';
import type { Scene } from './scene-graph.js';

interface UndoEntry {
  label: string;
  scene: Scene;
  objectId: number;
}

/** 에디터 세션 동안만 유지되는 생성 취소 기록 */
export class UndoJournal {
  private entries: UndoEntry[] = [];

  registerCreatedObjectUndo(scene: Scene, obj: SceneObject, label: string): void {
    this.entries.push({ label, scene, objectId: obj.id });
  }

  /** 가장 최근 생성을 되돌린다. 되돌린 항목의 라벨, 없으면 null */
  performUndo(): string | null {
    const entry = this.entries.pop();
    if (!entry) return null;
    if (entry.scene.removeRoot(entry.objectId)) {
      entry.scene.markDirty();
    }
    return entry.label;
  }

  get labels(): string[] {
    return this.entries.map(e => e.label);
  }
}
