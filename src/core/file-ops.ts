import { readFileSync, writeFileSync, mkdirSync, existsSync, statSync } from 'node:fs';
import { dirname } from 'node:path';
import { createHash } from 'node:crypto';
import type { EditorHost } from './editor-host.js';
import { resolveLogicalPath } from './project-paths.js';
import { logger } from '../utils/logger.js';

type WriterContext = Pick<EditorHost, 'projectRoot' | 'assets'>;

export function computeHash(content: string): string {
  return 'sha256:' + createHash('sha256').update(content).digest('hex');
}

export function computeFileHash(filePath: string): string {
  const content = readFileSync(filePath, 'utf-8');
  return computeHash(content);
}

export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

/** 무조건 덮어쓰기. 설치 경로가 아닌 도구 산출물(설정, 씬, 에셋) 전용 */
export function safeWriteFile(filePath: string, content: string): void {
  ensureDir(dirname(filePath));
  writeFileSync(filePath, content, 'utf-8');
}

export function readFileContent(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

// ─── 멱등 기록기 ───────────────────────────────────────────────

export function fileExists(ctx: Pick<EditorHost, 'projectRoot'>, logicalPath: string): boolean {
  const fullPath = resolveLogicalPath(ctx.projectRoot, logicalPath);
  return existsSync(fullPath) && statSync(fullPath).isFile();
}

export function folderExists(ctx: Pick<EditorHost, 'projectRoot'>, logicalPath: string): boolean {
  const fullPath = resolveLogicalPath(ctx.projectRoot, logicalPath);
  return existsSync(fullPath) && statSync(fullPath).isDirectory();
}

/**
 * 폴더와 빠진 조상 폴더를 만든다. 새로 만든 경우에만 에셋 인덱스에 반영하고,
 * 이미 있으면 아무 일도 하지 않는다.
 */
export function ensureFolder(ctx: WriterContext, logicalPath: string): void {
  if (folderExists(ctx, logicalPath)) return;
  ensureDir(resolveLogicalPath(ctx.projectRoot, logicalPath));
  ctx.assets.importAsset(logicalPath);
}

/**
 * 파일이 없을 때만 content 를 그대로 기록한다. 있으면 비교도 덮어쓰기도 하지 않는다.
 * @returns 실제로 기록했으면 true
 */
export function writeFile(ctx: WriterContext, logicalPath: string, content: string): boolean {
  if (fileExists(ctx, logicalPath)) {
    logger.fileAction('skip', logicalPath);
    return false;
  }
  const fullPath = resolveLogicalPath(ctx.projectRoot, logicalPath);
  ensureDir(dirname(fullPath));
  writeFileSync(fullPath, content, 'utf-8');
  logger.fileAction('create', logicalPath);
  return true;
}
