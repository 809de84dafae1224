import { describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeferredQueue } from '../src/core/deferred-queue.js';
import { openEditorHost, runIdleCycle } from '../src/core/editor-host.js';

describe('DeferredQueue', () => {
  it('should run queued operations in FIFO order', () => {
    const queue = new DeferredQueue();
    const order: string[] = [];
    queue.enqueue('a', () => order.push('a'));
    queue.enqueue('b', () => order.push('b'));

    const report = queue.drain();

    expect(order).toEqual(['a', 'b']);
    expect(report.ran).toEqual(['a', 'b']);
    expect(queue.size).toBe(0);
  });

  it('should defer operations queued during a drain to the next cycle', () => {
    const queue = new DeferredQueue();
    const order: string[] = [];
    queue.enqueue('outer', () => {
      order.push('outer');
      queue.enqueue('inner', () => order.push('inner'));
    });

    queue.drain();
    expect(order).toEqual(['outer']);
    expect(queue.labels).toEqual(['inner']);

    queue.drain();
    expect(order).toEqual(['outer', 'inner']);
  });

  it('should keep duplicates as separate entries', () => {
    const queue = new DeferredQueue();
    let count = 0;
    queue.enqueue('same', () => count++);
    queue.enqueue('same', () => count++);

    queue.drain();

    expect(count).toBe(2);
  });

  it('should requeue the unrun operations when one throws', () => {
    const queue = new DeferredQueue();
    queue.enqueue('ok', () => undefined);
    queue.enqueue('boom', () => {
      throw new Error('boom');
    });
    queue.enqueue('later', () => undefined);

    expect(() => queue.drain()).toThrow('boom');
    expect(queue.labels).toEqual(['later']);
  });

  it('should give each host its own queue unless one is shared', () => {
    const testDir = mkdtempSync(join(tmpdir(), 'framework-queue-test-'));
    try {
      const first = openEditorHost(testDir);
      const second = openEditorHost(testDir);
      expect(second.deferred).not.toBe(first.deferred);

      const shared = openEditorHost(testDir, { deferred: first.deferred });
      const order: string[] = [];
      first.deferred.enqueue('from-first', () => order.push('from-first'));
      shared.deferred.enqueue('from-shared', () => order.push('from-shared'));

      const report = runIdleCycle(shared);

      expect(order).toEqual(['from-first', 'from-shared']);
      expect(report.drain.ran).toEqual(['from-first', 'from-shared']);
      expect(first.deferred.size).toBe(0);
    } finally {
      rmSync(testDir, { recursive: true, force: true });
    }
  });
});
