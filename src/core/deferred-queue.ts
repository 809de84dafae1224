export type DeferredOperation = () => void;

interface QueuedOperation {
  label: string;
  run: DeferredOperation;
}

export interface DrainReport {
  ran: string[];
}

/**
 * idle 시점에 실행되는 프로세스 전역 FIFO 큐.
 * drain() 은 시작 시점까지 쌓인 작업만 실행하고, 실행 중에 추가된 작업은 다음 주기로 넘긴다.
 * 작업은 같은 것이 여러 번 등록될 수 있으므로 각각 멱등이어야 한다.
 *
 * 인스턴스는 EditorHost 마다 하나이며, 프로세스당 호스트를 하나만 여는 동안에만 프로세스 전역 큐와 같다.
 * 두 번째 호스트를 열려면 openEditorHost 의 `deferred` 옵션으로 같은 큐를 넘겨 공유해야 한다.
 */
export class DeferredQueue {
  private pending: QueuedOperation[] = [];

  enqueue(label: string, run: DeferredOperation): void {
    this.pending.push({ label, run });
  }

  get size(): number {
    return this.pending.length;
  }

  get labels(): string[] {
    return this.pending.map(op => op.label);
  }

  drain(): DrainReport {
    const batch = this.pending;
    this.pending = [];
    const ran: string[] = [];

    for (let i = 0; i < batch.length; i++) {
      const op = batch[i];
      try {
        op.run();
      } catch (err) {
        // 치명 오류는 그대로 전파하되, 아직 실행하지 않은 작업은 큐 앞에 되돌린다
        this.pending = [...batch.slice(i + 1), ...this.pending];
        throw err;
      }
      ran.push(op.label);
    }

    return { ran };
  }
}
