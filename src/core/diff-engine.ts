import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createPatch } from 'diff';
import type { FileChange, FileStatus } from '../types/common.js';
import type { FrameworkConfig } from '../types/config.js';
import type { ModuleDefinition } from '../types/module.js';
import { getTemplatesDir } from '../utils/paths.js';
import { computeFileHash } from './file-ops.js';
import { getModule } from './module-registry.js';
import { resolveLogicalPath } from './project-paths.js';

/**
 * 설치 기록(해시)과 현재 파일, 현재 템플릿을 비교한다.
 * 설치기는 기존 파일을 덮어쓰지 않으므로 여기서 보고만 한다.
 */
export function analyzeChanges(config: FrameworkConfig, projectRoot: string): FileChange[] {
  const changes: FileChange[] = [];
  const templatesDir = getTemplatesDir();

  for (const [relativePath, record] of Object.entries(config.files)) {
    const mod = getModule(record.module);
    const modFile = mod?.files.find(f => f.destination === relativePath);
    if (!modFile) continue;

    const destPath = resolveLogicalPath(projectRoot, relativePath);
    if (!existsSync(destPath)) {
      changes.push({ relativePath, status: 'MISSING', module: record.module });
      continue;
    }

    const srcPath = join(templatesDir, modFile.source);
    if (!existsSync(srcPath)) continue;

    const status = classifyFileStatus(record.hash, computeFileHash(destPath), computeFileHash(srcPath));
    if (status !== 'UNCHANGED') {
      changes.push({ relativePath, status, module: record.module });
    }
  }

  return changes;
}

export function classifyFileStatus(installedHash: string, currentHash: string, templateHash: string): FileStatus {
  const userModified = installedHash !== currentHash;
  const templateChanged = installedHash !== templateHash;

  if (!userModified && !templateChanged) return 'UNCHANGED';
  if (!userModified) return 'UPSTREAM_CHANGED';
  if (!templateChanged) return 'USER_MODIFIED';
  return 'CONFLICT';
}

/** 현재 파일 → 템플릿 방향의 unified diff. 같으면 빈 배열 */
export function generateModuleDiff(projectRoot: string, mod: ModuleDefinition): string[] {
  const templatesDir = getTemplatesDir();
  const patches: string[] = [];

  for (const file of mod.files) {
    const currentPath = resolveLogicalPath(projectRoot, file.destination);
    const srcPath = join(templatesDir, file.source);
    const currentContent = existsSync(currentPath) ? readFileSync(currentPath, 'utf-8') : '';
    const templateContent = existsSync(srcPath) ? readFileSync(srcPath, 'utf-8') : '';
    if (currentContent === templateContent) continue;
    patches.push(createPatch(file.destination, currentContent, templateContent, 'current', 'template'));
  }

  return patches;
}
