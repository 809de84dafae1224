import { describe, it, expect } from 'vitest';
import { McpResponseBuilder, errorResult, textResult } from '../src/types/mcp.js';

describe('McpResponseBuilder', () => {
  describe('header()', () => {
    it('should surround the title with blank lines and --- delimiters', () => {
      const lines = new McpResponseBuilder().header('제목').toText().split('\n');
      expect(lines).toEqual(['', '--- 제목 ---', '']);
    });
  });

  describe('status lines', () => {
    it('should prefix each level with its icon', () => {
      const text = new McpResponseBuilder()
        .info('정보')
        .ok('성공')
        .warn('경고')
        .error('실패')
        .toText();
      expect(text).toBe('ℹ 정보\n✓ 성공\n⚠ 경고\n✗ 실패');
    });

    it('should indent check marks', () => {
      const text = new McpResponseBuilder().check(true, '있음').check(false, '없음').toText();
      expect(text).toBe('  ✓ 있음\n  ✗ 없음');
    });
  });

  describe('table()', () => {
    it('should pad keys to the longest one', () => {
      const text = new McpResponseBuilder().table([['생성', '2개'], ['씬 저장', '예']]).toText();
      expect(text).toBe('  생성   : 2개\n  씬 저장 : 예');
    });

    it('should add nothing for an empty table', () => {
      expect(new McpResponseBuilder().table([]).toText()).toBe('');
    });
  });

  describe('fileAction()', () => {
    it('should mark created and skipped files', () => {
      const text = new McpResponseBuilder()
        .fileAction('create', 'Assets/A.cs')
        .fileAction('skip', 'Assets/B.cs')
        .toText();
      expect(text).toBe('  + Assets/A.cs\n  - Assets/B.cs');
    });
  });

  describe('log()', () => {
    it('should append the logger buffer and ignore empty text', () => {
      const text = new McpResponseBuilder().log('').log('[OK] 완료').toText();
      expect(text).toBe('[OK] 완료');
    });
  });

  describe('toResult()', () => {
    it('should wrap the text as a single text content block', () => {
      const result = new McpResponseBuilder().ok('완료').toResult();
      expect(result).toEqual({ content: [{ type: 'text', text: '✓ 완료' }], isError: false });
    });

    it('should flag errors', () => {
      expect(new McpResponseBuilder().toResult(true).isError).toBe(true);
    });
  });
});

describe('textResult / errorResult', () => {
  it('should build plain text results', () => {
    expect(textResult('hi')).toEqual({ content: [{ type: 'text', text: 'hi' }], isError: false });
  });

  it('should prefix errors with ✗', () => {
    expect(errorResult('실패')).toEqual({ content: [{ type: 'text', text: '✗ 실패' }], isError: true });
  });
});
