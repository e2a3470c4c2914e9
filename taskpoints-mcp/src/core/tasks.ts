import type { TaskStore } from "../state/store.js";
import type {
  SortKey,
  Task,
  TaskAddInput,
  TaskCompleteInput,
  TaskListInput,
  TaskRemoveInput,
  TaskUpdateInput,
} from "../types.js";
import { SORT_KEYS } from "../types.js";
import { TaskError } from "../errors.js";
import { timeKey, validateTask } from "../validate.js";

export function toSortKey(raw: string): SortKey {
  const key = SORT_KEYS.find((k) => k === raw);
  if (!key) {
    throw new TaskError("invalid_sort_key", `Invalid sort order '${raw}'. Choose 'time' or 'value'.`);
  }
  return key;
}

function sameIdentity(task: Task, time: string, event: string): boolean {
  return task.time === time && task.event === event;
}

export async function addTask(store: TaskStore, input: TaskAddInput): Promise<Task> {
  const task = validateTask(input.time, input.event, input.value);
  const tasks = await store.loadTasks();

  if (tasks.some((t) => sameIdentity(t, task.time, task.event))) {
    throw new TaskError(
      "duplicate_task",
      `Task with time '${task.time}' and event '${task.event}' already exists`
    );
  }

  tasks.push(task);
  await store.save(tasks);
  return task;
}

/** Changes only `value`; `completed` and position are kept. */
export async function updateTask(store: TaskStore, input: TaskUpdateInput): Promise<Task> {
  const { time, event, value } = validateTask(input.time, input.event, input.value);
  const tasks = await store.loadTasks();

  const task = tasks.find((t) => sameIdentity(t, time, event));
  if (!task) {
    throw new TaskError("not_found", `No task found with time '${time}' and event '${event}'`);
  }

  task.value = value;
  await store.save(tasks);
  return task;
}

export async function removeTask(store: TaskStore, input: TaskRemoveInput): Promise<Task> {
  const time = timeKey(input.time);
  const tasks = await store.loadTasks();

  const idx = tasks.findIndex((t) => sameIdentity(t, time, input.event));
  if (idx === -1) {
    throw new TaskError("not_found", `No task found with time '${time}' and event '${input.event}'`);
  }

  const [removed] = tasks.splice(idx, 1);
  await store.save(tasks);
  return removed;
}

/** Matches on event alone; the first task in storage order wins. */
export async function completeTask(store: TaskStore, input: TaskCompleteInput): Promise<Task> {
  const tasks = await store.loadTasks();

  const task = tasks.find((t) => t.event === input.event);
  if (!task) {
    throw new TaskError("not_found", `No task found with event '${input.event}'`);
  }

  task.completed = true;
  await store.save(tasks);
  return task;
}

export async function listTasks(store: TaskStore, input: TaskListInput = {}): Promise<Task[]> {
  const orderBy = toSortKey(input.orderBy ?? "time");
  const tasks = await store.loadTasks();

  // Array.prototype.sort is stable, so ties keep storage order
  if (orderBy === "time") {
    return tasks.sort((a, b) => (a.time < b.time ? -1 : a.time > b.time ? 1 : 0));
  }
  return tasks.sort((a, b) => b.value - a.value);
}
