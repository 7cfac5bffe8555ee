export interface HeapEntry<T> {
  readonly k: number;
  readonly v: T;
}

type Slot<T> = { k: number; seq: number; v: T; stale: boolean };

/**
 * Binary min-heap with FIFO order among equal keys.
 *
 * Entries are never removed in place: `invalidate` tags one stale and `pop`
 * drops stale entries as they surface. `size()` counts live entries only.
 */
export class MinHeap<T> {
  private a: Slot<T>[] = [];
  private seq = 0;
  private live = 0;
  private slots = new WeakMap<HeapEntry<T>, Slot<T>>();
  size() {
    return this.live;
  }
  push(k: number, v: T): HeapEntry<T> {
    const slot = { k, seq: this.seq++, v, stale: false };
    this.a.push(slot);
    this.slots.set(slot, slot);
    this.live++;
    this.bubbleUp(this.a.length - 1);
    return slot;
  }
  invalidate(entry: HeapEntry<T>) {
    const slot = this.slots.get(entry);
    if (!slot || slot.stale) return;
    slot.stale = true;
    this.live--;
  }
  pop(): T | undefined {
    while (this.a.length) {
      const top = this.a[0];
      this.dropTop();
      if (top.stale) continue;
      this.live--;
      return top.v;
    }
    return undefined;
  }
  private dropTop() {
    const last = this.a.pop();
    if (last && this.a.length) {
      this.a[0] = last;
      this.bubbleDown(0);
    }
  }
  private less(i: number, j: number) {
    const x = this.a[i];
    const y = this.a[j];
    return x.k < y.k || (x.k === y.k && x.seq < y.seq);
  }
  private bubbleUp(i: number) {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(i, p)) break;
      [this.a[p], this.a[i]] = [this.a[i], this.a[p]];
      i = p;
    }
  }
  private bubbleDown(i: number) {
    const n = this.a.length;
    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let m = i;
      if (l < n && this.less(l, m)) m = l;
      if (r < n && this.less(r, m)) m = r;
      if (m === i) break;
      [this.a[m], this.a[i]] = [this.a[i], this.a[m]];
      i = m;
    }
  }
}
