import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, mkdir, rm, writeFile } from "node:fs/promises";
import { TaskStore } from "../state/store.js";
import { addTask, completeTask, listTasks, removeTask, updateTask } from "../core/tasks.js";

const TEST_DIR = "/tmp/taskpoints-test-tasks";
const TEST_FILE = `${TEST_DIR}/tasks.json`;

let store: TaskStore;

beforeEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
  store = new TaskStore(TEST_FILE);
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe("addTask", () => {
  it("appends a new incomplete task", async () => {
    const task = await addTask(store, { time: "2023-01-01T10:00:00", event: "Test Event", value: 5 });

    expect(task).toEqual({ time: "2023-01-01T10:00:00", event: "Test Event", value: 5, completed: false });
    expect(await store.loadTasks()).toEqual([task]);
  });

  it("keeps existing records that lack a completed flag", async () => {
    await mkdir(TEST_DIR, { recursive: true });
    await writeFile(
      TEST_FILE,
      JSON.stringify([
        { time: "2023-06-15T09:00:00", event: "Morning meeting", value: 5 },
        { time: "2023-06-16T12:00:00", event: "Lunch", value: 3, completed: true },
      ]),
      "utf-8"
    );

    await addTask(store, { time: "2023-06-17T08:00:00", event: "New", value: 1 });

    expect((await listTasks(store)).map((t) => [t.event, t.completed])).toEqual([
      ["Morning meeting", false],
      ["Lunch", true],
      ["New", false],
    ]);
  });

  it("stores a Date in canonical form", async () => {
    const task = await addTask(store, { time: new Date(2023, 0, 1, 10, 0, 0), event: "Test Event", value: 5 });
    expect(task.time).toBe("2023-01-01T10:00:00");
  });

  it("rejects a duplicate and keeps the first value", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "Test Event", value: 5 });

    await expect(
      addTask(store, { time: "2023-01-01T10:00:00", event: " Test Event ", value: 10 })
    ).rejects.toMatchObject({
      code: "duplicate_task",
      message: "Task with time '2023-01-01T10:00:00' and event 'Test Event' already exists",
    });

    const tasks = await store.loadTasks();
    expect(tasks).toHaveLength(1);
    expect(tasks[0].value).toBe(5);
  });

  it("allows a shared time or a shared event on their own", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "A", value: 1 });
    await addTask(store, { time: "2023-01-01T10:00:00", event: "B", value: 1 });
    await addTask(store, { time: "2023-01-02T10:00:00", event: "A", value: 1 });
    expect(await store.loadTasks()).toHaveLength(3);
  });

  it("writes nothing when validation fails", async () => {
    await expect(
      addTask(store, { time: "not-a-valid-time", event: "Test Event", value: 5 })
    ).rejects.toMatchObject({ code: "invalid_time" });
    await expect(access(TEST_FILE)).rejects.toThrow();
  });
});

describe("updateTask", () => {
  it("changes only the value", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "First", value: 1 });
    await addTask(store, { time: "2023-01-01T11:00:00", event: "Second", value: 2 });
    await completeTask(store, { event: "First" });

    const updated = await updateTask(store, { time: "2023-01-01T10:00:00", event: "First", value: 10 });

    expect(updated).toEqual({ time: "2023-01-01T10:00:00", event: "First", value: 10, completed: true });
    expect((await store.loadTasks()).map((t) => t.event)).toEqual(["First", "Second"]);
  });

  it("finds the task from a Date", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "Test Event", value: 5 });
    const updated = await updateTask(store, { time: new Date(2023, 0, 1, 10), event: "Test Event", value: 7 });
    expect(updated.value).toBe(7);
  });

  it("fails for an unknown task", async () => {
    await expect(
      updateTask(store, { time: "2023-01-01T10:00:00", event: "Nonexistent Event", value: 10 })
    ).rejects.toMatchObject({
      code: "not_found",
      message: "No task found with time '2023-01-01T10:00:00' and event 'Nonexistent Event'",
    });
  });

  it("validates the new value", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "Test Event", value: 5 });
    await expect(
      updateTask(store, { time: "2023-01-01T10:00:00", event: "Test Event", value: 2.5 })
    ).rejects.toMatchObject({ code: "invalid_value" });
    expect((await store.loadTasks())[0].value).toBe(5);
  });
});

describe("removeTask", () => {
  it("removes one task and keeps the order of the rest", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "Test Event 1", value: 5 });
    await addTask(store, { time: "2023-01-01T11:00:00", event: "Test Event 2", value: 10 });
    await addTask(store, { time: "2023-01-01T12:00:00", event: "Test Event 3", value: 15 });

    const removed = await removeTask(store, { time: "2023-01-01T11:00:00", event: "Test Event 2" });

    expect(removed.event).toBe("Test Event 2");
    expect((await store.loadTasks()).map((t) => t.event)).toEqual(["Test Event 1", "Test Event 3"]);
  });

  it("accepts a Date", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "Test Event", value: 5 });
    const removed = await removeTask(store, { time: new Date(2023, 0, 1, 10, 0, 0), event: "Test Event" });
    expect(removed.time).toBe("2023-01-01T10:00:00");
    expect(await store.loadTasks()).toEqual([]);
  });

  it("fails for an unknown task and leaves the collection alone", async () => {
    await addTask(store, { time: "2023-01-01T10:00:00", event: "Test Event", value: 5 });

    await expect(
      removeTask(store, { time: "2023-01-01T10:00:00", event: "Nonexistent Event" })
    ).rejects.toMatchObject({ code: "not_found" });
    expect(await store.loadTasks()).toHaveLength(1);
  });

  it("does not parse the time text", async () => {
    await expect(removeTask(store, { time: "whenever", event: "x" })).rejects.toMatchObject({
      code: "not_found",
      message: "No task found with time 'whenever' and event 'x'",
    });
  });
});

describe("completeTask", () => {
  it("marks the first task with the event completed", async () => {
    await addTask(store, { time: "2023-01-02T07:00:00", event: "Gym", value: 1 });
    await addTask(store, { time: "2023-01-01T07:00:00", event: "Gym", value: 2 });

    const done = await completeTask(store, { event: "Gym" });

    expect(done.time).toBe("2023-01-02T07:00:00");
    expect((await store.loadTasks()).map((t) => t.completed)).toEqual([true, false]);
  });

  it("fails for an unknown event", async () => {
    await expect(completeTask(store, { event: "Nothing" })).rejects.toMatchObject({
      code: "not_found",
      message: "No task found with event 'Nothing'",
    });
  });
});

describe("listTasks", () => {
  beforeEach(async () => {
    await addTask(store, { time: "2023-01-03T10:00:00", event: "C", value: 3 });
    await addTask(store, { time: "2023-01-01T10:00:00", event: "A", value: 5 });
    await addTask(store, { time: "2023-01-02T10:00:00", event: "B", value: 3 });
  });

  it("sorts by time ascending by default", async () => {
    expect((await listTasks(store)).map((t) => t.event)).toEqual(["A", "B", "C"]);
    expect((await listTasks(store, { orderBy: "time" })).map((t) => t.event)).toEqual(["A", "B", "C"]);
  });

  it("sorts by value descending and keeps ties in storage order", async () => {
    expect((await listTasks(store, { orderBy: "value" })).map((t) => t.event)).toEqual(["A", "C", "B"]);
  });

  it("does not reorder storage", async () => {
    await listTasks(store, { orderBy: "time" });
    expect((await store.loadTasks()).map((t) => t.event)).toEqual(["C", "A", "B"]);
  });

  it("rejects an unknown sort key", async () => {
    await expect(listTasks(store, { orderBy: "priority" })).rejects.toMatchObject({
      code: "invalid_sort_key",
      message: "Invalid sort order 'priority'. Choose 'time' or 'value'.",
    });
  });
});

describe("scenario", () => {
  it("orders the morning meeting first by both keys", async () => {
    await addTask(store, { time: "2023-06-15T09:00:00", event: "Morning meeting", value: 5 });
    await addTask(store, { time: "2023-06-16T12:00:00", event: "Lunch", value: 3 });

    const byValue = await listTasks(store, { orderBy: "value" });
    expect(byValue.map((t) => [t.event, t.value])).toEqual([["Morning meeting", 5], ["Lunch", 3]]);

    const byTime = await listTasks(store, { orderBy: "time" });
    expect(byTime.map((t) => t.event)).toEqual(["Morning meeting", "Lunch"]);
  });
});
