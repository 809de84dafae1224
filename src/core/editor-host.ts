import { AssetDatabase } from './asset-database.js';
import { ScriptCompiler, type CompileReport } from './script-compiler.js';
import { SceneManager } from './scene-graph.js';
import { UndoJournal } from './undo-journal.js';
import { DeferredQueue, type DrainReport } from './deferred-queue.js';
import { DEFAULT_SCENE_PATH } from './project-paths.js';

/**
 * 스캐폴딩 엔진이 동작하는 에디터 호스트.
 * 파일시스템, 에셋 인덱스, 컴파일러, 씬, 되돌리기, 지연 큐를 한데 묶는다.
 * 모든 변경은 단일 스레드에서 일어난다.
 */
export interface EditorHost {
  readonly projectRoot: string;
  readonly assets: AssetDatabase;
  readonly compiler: ScriptCompiler;
  readonly scenes: SceneManager;
  readonly undo: UndoJournal;
  readonly deferred: DeferredQueue;
}

export interface EditorHostOptions {
  scenePath?: string;
  /** 같은 프로세스의 다른 호스트와 공유할 지연 큐 (없으면 새로 만든다) */
  deferred?: DeferredQueue;
}

export interface IdleReport {
  indexed: number;
  compile: CompileReport;
  drain: DrainReport;
}

export interface SaveReport {
  assets: string[];
  sceneSaved: boolean;
}

/** 에디터를 여는 것과 같다: 씬을 로드하고 인덱스 스캔과 첫 컴파일을 한다 */
export function openEditorHost(projectRoot: string, options: EditorHostOptions = {}): EditorHost {
  const assets = new AssetDatabase(projectRoot);
  const compiler = new ScriptCompiler(projectRoot);
  const scenes = new SceneManager(projectRoot, options.scenePath ?? DEFAULT_SCENE_PATH);

  assets.refresh();
  compiler.compile();

  return {
    projectRoot,
    assets,
    compiler,
    scenes,
    undo: new UndoJournal(),
    deferred: options.deferred ?? new DeferredQueue(),
  };
}

/**
 * 호스트의 idle 주기 한 번: 에셋 재스캔 → 재컴파일 → 지연 큐 drain.
 * 큐는 주기마다 정확히 한 번 비워진다.
 */
export function runIdleCycle(host: EditorHost): IdleReport {
  const indexed = host.assets.refresh();
  const compile = host.compiler.compile();
  const drain = host.deferred.drain();
  return { indexed, compile, drain };
}

/** 변경된 에셋 flush + dirty 씬 저장 */
export function saveEditorHost(host: EditorHost): SaveReport {
  const assets = host.assets.saveAssets();
  const sceneSaved = host.scenes.saveIfDirty();
  return { assets, sceneSaved };
}
