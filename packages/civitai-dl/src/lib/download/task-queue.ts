// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Prioritized {
  readonly id: string;
  readonly priority: number;
}

export interface TaskQueue<T extends Prioritized> {
  add(task: T): void;
  /** Most urgent live entry, or undefined when none is left */
  next(): T | undefined;
  /**
   * Mark the task's entry as removed; it stays in the heap and `next()` skips it.
   * Returns false if the task is not queued.
   */
  remove(id: string): boolean;
  has(id: string): boolean;
  /** Live entries only */
  size(): number;
}

interface Entry<T> {
  task: T;
  /** Insertion counter, breaks priority ties FIFO */
  seq: number;
  removed: boolean;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function before<T extends Prioritized>(a: Entry<T>, b: Entry<T>): boolean {
  if (a.task.priority !== b.task.priority) return a.task.priority < b.task.priority;
  return a.seq < b.seq;
}

/**
 * Binary min-heap over (priority, insertion order) with lazy removal.
 */
export function createTaskQueue<T extends Prioritized>(): TaskQueue<T> {
  const heap: Entry<T>[] = [];
  const live = new Map<string, Entry<T>>();
  let seq = 0;

  function swap(i: number, j: number): void {
    const a = heap[i];
    const b = heap[j];
    if (a === undefined || b === undefined) return;
    heap[i] = b;
    heap[j] = a;
  }

  function siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const child = heap[i];
      const up = heap[parent];
      if (child === undefined || up === undefined || !before(child, up)) return;
      swap(i, parent);
      i = parent;
    }
  }

  function siftDown(index: number): void {
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      const l = heap[left];
      const r = heap[right];
      const s = heap[smallest];
      if (l !== undefined && s !== undefined && before(l, s)) smallest = left;
      const best = heap[smallest];
      if (r !== undefined && best !== undefined && before(r, best)) smallest = right;
      if (smallest === i) return;
      swap(i, smallest);
      i = smallest;
    }
  }

  function pop(): Entry<T> | undefined {
    const top = heap[0];
    const last = heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (heap.length > 0) {
      heap[0] = last;
      siftDown(0);
    }
    return top;
  }

  return {
    add(task) {
      const existing = live.get(task.id);
      if (existing) existing.removed = true;

      const entry: Entry<T> = { task, seq: seq++, removed: false };
      heap.push(entry);
      live.set(task.id, entry);
      siftUp(heap.length - 1);
    },

    next() {
      for (let entry = pop(); entry !== undefined; entry = pop()) {
        if (entry.removed) continue;
        live.delete(entry.task.id);
        return entry.task;
      }
      return undefined;
    },

    remove(id) {
      const entry = live.get(id);
      if (!entry) return false;
      entry.removed = true;
      live.delete(id);
      return true;
    },

    has: (id) => live.has(id),
    size: () => live.size,
  };
}
