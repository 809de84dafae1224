import { EDITOR_ASSEMBLY, RUNTIME_ASSEMBLY, GLOBAL_SCOPE, type TypeHandle, type TypeScope } from '../types/asset.js';
import type { EditorHost } from './editor-host.js';

/** 갓 생성된 사용자 타입이 있을 가능성이 높은 순서 */
export const TYPE_SEARCH_ORDER: readonly TypeScope[] = [RUNTIME_ASSEMBLY, EDITOR_ASSEMBLY, GLOBAL_SCOPE];

/**
 * 이름으로 타입을 찾는다. 첫 번째로 찾은 범위에서 멈춘다.
 *
 * null 은 "아직 컴파일되지 않음"을 뜻하며 영구 오류가 아니다.
 * 호출자는 다음 idle 주기(재설치)로 재시도해야 한다.
 */
export function resolveType(host: Pick<EditorHost, 'compiler'>, name: string): TypeHandle | null {
  for (const scope of TYPE_SEARCH_ORDER) {
    const found = scope === GLOBAL_SCOPE
      ? host.compiler.findGlobal(name)
      : host.compiler.findInAssembly(scope, name);
    if (found) return found;
  }
  return null;
}
