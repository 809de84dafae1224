/**
 * EditorLogger: 메시지 수집기 패턴
 * 코어 모듈은 콘솔에 직접 쓰지 않고 내부 버퍼에 메시지를 모은다.
 * CLI는 flush() 결과를 printLog()로 색을 입혀 출력하고,
 * MCP 서버는 stdout이 JSON-RPC 전용이므로 도구 응답 본문에 덧붙인다.
 */

import chalk from 'chalk';
import type { FileAction } from '../types/common.js';

const FILE_ACTION_ICONS: Record<FileAction, string> = {
  create: '+',
  skip: '-',
};

class EditorLogger {
  private buffer: string[] = [];

  info(msg: string): void {
    this.buffer.push(`[INFO] ${msg}`);
  }

  ok(msg: string): void {
    this.buffer.push(`[OK] ${msg}`);
  }

  warn(msg: string): void {
    this.buffer.push(`[WARN] ${msg}`);
  }

  error(msg: string): void {
    this.buffer.push(`[ERROR] ${msg}`);
  }

  dim(msg: string): void {
    this.buffer.push(msg);
  }

  header(msg: string): void {
    this.buffer.push('');
    this.buffer.push(`## ${msg}`);
    this.buffer.push('─'.repeat(msg.length + 2));
  }

  table(rows: [string, string][]): void {
    if (rows.length === 0) return;
    const maxKey = Math.max(...rows.map(([k]) => k.length));
    for (const [key, value] of rows) {
      this.buffer.push(`  ${key.padEnd(maxKey)}  ${value}`);
    }
  }

  fileAction(action: FileAction, path: string): void {
    this.buffer.push(`  ${FILE_ACTION_ICONS[action]} ${path}`);
  }

  /** 버퍼의 모든 메시지를 하나의 문자열로 반환하고 비운다 */
  flush(): string {
    const text = this.buffer.join('\n');
    this.buffer = [];
    return text;
  }

  /** 버퍼를 비우지 않고 현재 내용 반환 */
  toText(): string {
    return this.buffer.join('\n');
  }

  /** 버퍼를 비우지 않고 현재 줄 목록 반환 */
  lines(): string[] {
    return [...this.buffer];
  }

  clear(): void {
    this.buffer = [];
  }
}

export const logger = new EditorLogger();

function colorize(line: string): string {
  if (line.startsWith('[OK]')) return chalk.green(line);
  if (line.startsWith('[WARN]')) return chalk.yellow(line);
  if (line.startsWith('[ERROR]')) return chalk.red(line);
  if (line.startsWith('## ')) return chalk.bold(line);
  if (line.startsWith('  - ')) return chalk.dim(line);
  if (line.startsWith('  + ')) return chalk.cyan(line);
  return line;
}

/** CLI 전용: 로거 버퍼를 비우면서 콘솔에 출력 */
export function printLog(): void {
  const text = logger.flush();
  if (!text) return;
  console.log(text.split('\n').map(colorize).join('\n'));
}
