/**
 * Single Flight
 * 同一個 key 同時只會有一個進行中的請求，其他呼叫者共用同一個 Promise
 * 不同 key 之間互不等待
 */

export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  /**
   * 執行 fn；若同 key 已有進行中的請求則直接共用
   * @returns shared 表示是否共用了別人的請求
   */
  async run(key: string, fn: () => Promise<T>): Promise<{ value: T; shared: boolean }> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return { value: await existing, shared: true };
    }

    const promise = fn();
    this.inFlight.set(key, promise);

    try {
      return { value: await promise, shared: false };
    } finally {
      // 成功或失敗都清除，失敗不會被記住
      this.inFlight.delete(key);
    }
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
