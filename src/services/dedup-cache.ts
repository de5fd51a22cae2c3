export const DEFAULT_DEDUP_CAPACITY = 500;

/**
 * 처리한 채팅 메시지 ID 기억 (FIFO, 용량 제한)
 *
 * Set은 삽입 순서를 유지하므로 가장 오래된 ID부터 제거된다.
 * 제거된 ID가 다시 오면 새 메시지로 취급됨.
 */
export class DedupCache {
  readonly capacity: number;
  private readonly ids = new Set<string>();

  constructor(capacity: number = DEFAULT_DEDUP_CAPACITY) {
    this.capacity = Number.isFinite(capacity) ? Math.max(1, Math.floor(capacity)) : DEFAULT_DEDUP_CAPACITY;
  }

  get size(): number {
    return this.ids.size;
  }

  seen(id: string): boolean {
    return this.ids.has(id);
  }

  markSeen(id: string): void {
    if (this.ids.has(id)) return;
    this.ids.add(id);
    this.evictOverflow();
  }

  private evictOverflow(): void {
    if (this.ids.size <= this.capacity) return;
    for (const oldest of this.ids) {
      this.ids.delete(oldest);
      if (this.ids.size <= this.capacity) break;
    }
  }
}
