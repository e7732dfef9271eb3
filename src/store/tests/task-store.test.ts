import { describe, expect, it } from "vitest";
import { createTaskStore } from "../task-store";
import { TASK_TEXT_MAX_LENGTH, type Task, type TaskStore } from "../types";

/** Creates a task and fails the test if the store rejects it */
const mustCreate = (store: TaskStore, text: string): Task => {
  const result = store.create(text);
  if (result.isErr) {
    throw new Error(`create("${text}") failed: ${result.error.message}`);
  }
  return result.value;
};

describe("TaskStore - create", () => {
  it("should assign ids starting at 1", () => {
    const store = createTaskStore();

    expect(mustCreate(store, "first")).toEqual({ id: 1, text: "first" });
    expect(mustCreate(store, "second")).toEqual({ id: 2, text: "second" });
  });

  it("should trim surrounding whitespace", () => {
    const store = createTaskStore();
    const task = mustCreate(store, "  buy milk  ");

    expect(task.text).toBe("buy milk");
    expect(store.list()).toEqual([{ id: 1, text: "buy milk" }]);
  });

  it("should accept text of exactly the maximum length", () => {
    const store = createTaskStore();
    const text = "x".repeat(TASK_TEXT_MAX_LENGTH);

    expect(mustCreate(store, text).text).toHaveLength(TASK_TEXT_MAX_LENGTH);
  });

  it("should measure the length after trimming", () => {
    const store = createTaskStore();
    const text = ` ${"x".repeat(TASK_TEXT_MAX_LENGTH)} `;

    expect(mustCreate(store, text).text).toHaveLength(TASK_TEXT_MAX_LENGTH);
  });

  it("should reject whitespace-only text without consuming an id", () => {
    const store = createTaskStore();
    const result = store.create("   ");

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.kind).toBe("invalid_text");
      expect(result.error.message).toBe("Task text must not be empty");
    }
    expect(store.list()).toEqual([]);
    expect(store.stats()).toEqual({ tasksCount: 0, nextId: 1 });
  });

  it("should reject text longer than the maximum", () => {
    const store = createTaskStore();
    const result = store.create("x".repeat(TASK_TEXT_MAX_LENGTH + 1));

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.message).toBe(
        "Task text must be at most 200 characters"
      );
    }
    expect(store.stats().nextId).toBe(1);
  });

  it("should count characters outside the BMP once each", () => {
    const store = createTaskStore();
    const text = "😀".repeat(TASK_TEXT_MAX_LENGTH);

    const task = mustCreate(store, text);

    expect(task.text).toBe(text);
    expect([...task.text]).toHaveLength(TASK_TEXT_MAX_LENGTH);
  });

  it("should reject one character outside the BMP over the maximum", () => {
    const store = createTaskStore();
    const result = store.create("😀".repeat(TASK_TEXT_MAX_LENGTH + 1));

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.issues[0]?.code).toBe("too_big");
      expect(result.error.message).toBe(
        "Task text must be at most 200 characters"
      );
    }
    expect(store.stats().nextId).toBe(1);
  });

  it("should return frozen tasks", () => {
    const store = createTaskStore();
    const task = mustCreate(store, "immutable");

    expect(Object.isFrozen(task)).toBe(true);
  });
});

describe("TaskStore - list", () => {
  it("should return an empty list for a new store", () => {
    expect(createTaskStore().list()).toEqual([]);
  });

  it("should return tasks in insertion order", () => {
    const store = createTaskStore();
    mustCreate(store, "a");
    mustCreate(store, "b");
    mustCreate(store, "c");

    expect(store.list().map((t) => t.text)).toEqual(["a", "b", "c"]);
  });

  it("should return a copy that does not alias the store", () => {
    const store = createTaskStore();
    mustCreate(store, "a");

    const snapshot = store.list();
    snapshot.pop();

    expect(store.list()).toHaveLength(1);
  });
});

describe("TaskStore - delete", () => {
  it("should remove the task and return its data", () => {
    const store = createTaskStore();
    const task = mustCreate(store, "  buy milk ");

    const result = store.delete(task.id);

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value).toEqual({ id: 1, text: "buy milk" });
    }
    expect(store.list()).toEqual([]);
  });

  it("should return NotFound for an id that was never issued", () => {
    const store = createTaskStore();
    mustCreate(store, "a");

    const result = store.delete(42);

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error).toEqual({
        kind: "not_found",
        id: 42,
        message: "Task with id 42 not found",
      });
    }
  });

  it("should leave the store unchanged when the id is missing", () => {
    const store = createTaskStore();
    mustCreate(store, "a");
    mustCreate(store, "b");
    const before = store.list();
    const statsBefore = store.stats();

    store.delete(99);

    expect(store.list()).toEqual(before);
    expect(store.stats()).toEqual(statsBefore);
  });

  it("should keep the relative order of the remaining tasks", () => {
    const store = createTaskStore();
    for (const text of ["a", "b", "c", "d"]) {
      mustCreate(store, text);
    }

    store.delete(1);

    expect(store.list()).toEqual([
      { id: 2, text: "b" },
      { id: 3, text: "c" },
      { id: 4, text: "d" },
    ]);
  });

  it("should run the create/delete scenario end to end", () => {
    const store = createTaskStore();
    expect(mustCreate(store, "a").id).toBe(1);
    expect(mustCreate(store, "b").id).toBe(2);

    const first = store.delete(1);
    expect(first.isOk).toBe(true);
    if (first.isOk) {
      expect(first.value).toEqual({ id: 1, text: "a" });
    }

    expect(store.list()).toEqual([{ id: 2, text: "b" }]);

    const again = store.delete(1);
    expect(again.isErr).toBe(true);
    if (again.isErr) {
      expect(again.error.kind).toBe("not_found");
    }
  });
});

describe("TaskStore - id integrity", () => {
  it("should never reuse ids after deletes", () => {
    const store = createTaskStore();
    const issued: number[] = [];

    for (let round = 0; round < 5; round++) {
      const a = mustCreate(store, `a${round}`);
      const b = mustCreate(store, `b${round}`);
      issued.push(a.id, b.id);
      store.delete(b.id);
      store.delete(a.id);
    }

    expect(issued).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(new Set(issued).size).toBe(issued.length);
    expect(store.stats()).toEqual({ tasksCount: 0, nextId: 11 });
  });

  it("should keep separate counters for separate stores", () => {
    const first = createTaskStore();
    const second = createTaskStore();
    mustCreate(first, "a");
    mustCreate(first, "b");

    expect(mustCreate(second, "c").id).toBe(1);
  });
});
