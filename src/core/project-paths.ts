/**
 * 프로젝트 레벨 경로 빌더
 *
 * 논리 경로(예: "Assets/_Framework/Ads/AdsManager.cs")는 프로젝트 루트 기준의
 * '/' 구분 문자열이며, 같은 모듈은 실행마다 항상 같은 논리 경로를 대상으로 한다.
 * 절대 경로 변환은 이 파일에서만 한다.
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';

// ============================================================
// 루트 디렉토리
// ============================================================

export const ASSETS_ROOT = 'Assets';

/** 활성 씬 기본 위치 */
export const DEFAULT_SCENE_PATH = 'Assets/Scenes/SampleScene.scene.json';

/** build-settings 결과가 기록되는 위치 */
export const PLAYER_SETTINGS_PATH = 'ProjectSettings/PlayerSettings.json';

// ============================================================
// 변환
// ============================================================

/** 논리 경로 → 절대 경로. 부작용 없음 */
export function resolveLogicalPath(projectRoot: string, logicalPath: string): string {
  return resolve(projectRoot, ...logicalPath.split('/'));
}

/** 절대 경로 → 논리 경로 ('/' 구분) */
export function toLogicalPath(projectRoot: string, absolutePath: string): string {
  const rel = isAbsolute(absolutePath) ? relative(projectRoot, absolutePath) : absolutePath;
  return rel.split(sep).join('/');
}

/** 논리 경로의 조상 폴더 목록 (가까운 것부터) */
export function logicalAncestors(logicalPath: string): string[] {
  const segments = logicalPath.split('/').filter(Boolean);
  const ancestors: string[] = [];
  for (let i = segments.length - 1; i > 0; i--) {
    ancestors.push(segments.slice(0, i).join('/'));
  }
  return ancestors;
}

/** 에디터 전용 컴파일 단위에 속하는 경로인지 ('Editor' 폴더 하위) */
export function isEditorPath(logicalPath: string): boolean {
  return logicalPath.split('/').slice(0, -1).includes('Editor');
}
