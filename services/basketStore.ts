import type { BasketItem } from '../types';

type Listener = (items: readonly BasketItem[]) => void;

/**
 * 页面内的购物篮
 * 每次变更都会替换 items 数组，订阅方可以直接按引用比较
 */
export class BasketStore {
  private snapshot: readonly BasketItem[] = [];
  private readonly listeners = new Set<Listener>();

  get items(): readonly BasketItem[] {
    return this.snapshot;
  }

  get size(): number {
    return this.snapshot.length;
  }

  has(url: string): boolean {
    return this.snapshot.some(item => item.url === url);
  }

  /**
   * 按 url 去重，已存在时返回 false
   */
  add(item: BasketItem): boolean {
    if (this.has(item.url)) return false;
    this.commit([...this.snapshot, { ...item }]);
    return true;
  }

  remove(url: string): void {
    const next = this.snapshot.filter(item => item.url !== url);
    if (next.length !== this.snapshot.length) this.commit(next);
  }

  clear(): void {
    if (this.snapshot.length > 0) this.commit([]);
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(next: readonly BasketItem[]): void {
    this.snapshot = next;
    this.listeners.forEach(listener => listener(next));
  }
}
