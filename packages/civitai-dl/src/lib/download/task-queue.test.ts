import { describe, it, expect } from "vitest";
import { createTaskQueue, type TaskQueue } from "./task-queue.js";

interface Item {
  id: string;
  priority: number;
}

function drain(queue: TaskQueue<Item>): string[] {
  const ids: string[] = [];
  for (let item = queue.next(); item !== undefined; item = queue.next()) {
    ids.push(item.id);
  }
  return ids;
}

describe("createTaskQueue", () => {
  it("dequeues by ascending priority", () => {
    const queue = createTaskQueue<Item>();
    queue.add({ id: "five", priority: 5 });
    queue.add({ id: "one", priority: 1 });
    queue.add({ id: "three", priority: 3 });

    expect(drain(queue)).toEqual(["one", "three", "five"]);
  });

  it("keeps submission order for equal priorities", () => {
    const queue = createTaskQueue<Item>();
    for (const id of ["a", "b", "c", "d", "e", "f"]) {
      queue.add({ id, priority: 2 });
    }
    queue.add({ id: "urgent", priority: 0 });

    expect(drain(queue)).toEqual(["urgent", "a", "b", "c", "d", "e", "f"]);
  });

  it("skips removed entries", () => {
    const queue = createTaskQueue<Item>();
    queue.add({ id: "a", priority: 1 });
    queue.add({ id: "b", priority: 2 });
    queue.add({ id: "c", priority: 3 });

    expect(queue.remove("a")).toBe(true);
    expect(queue.size()).toBe(2);
    expect(queue.has("a")).toBe(false);
    expect(drain(queue)).toEqual(["b", "c"]);
  });

  it("reports false when removing something not queued", () => {
    const queue = createTaskQueue<Item>();
    queue.add({ id: "a", priority: 1 });
    queue.next();

    expect(queue.remove("a")).toBe(false);
    expect(queue.remove("missing")).toBe(false);
  });

  it("accepts a task again after removal, at its new position", () => {
    const queue = createTaskQueue<Item>();
    queue.add({ id: "a", priority: 1 });
    queue.add({ id: "b", priority: 1 });
    queue.remove("a");
    queue.add({ id: "a", priority: 1 });

    expect(drain(queue)).toEqual(["b", "a"]);
  });

  it("returns undefined when empty", () => {
    const queue = createTaskQueue<Item>();

    expect(queue.next()).toBeUndefined();
    expect(queue.size()).toBe(0);
  });

  it("orders a larger mixed batch", () => {
    const queue = createTaskQueue<Item>();
    const priorities = [7, 3, 9, 1, 3, 0, 8, 1, 5];
    priorities.forEach((priority, i) => queue.add({ id: `t${i}`, priority }));

    expect(drain(queue)).toEqual(["t5", "t3", "t7", "t1", "t4", "t8", "t0", "t6", "t2"]);
  });
});
