import type { TaskStore } from "../state/store.js";
import type {
  Task,
  TaskAddInput,
  TaskCompleteInput,
  TaskListInput,
  TaskRemoveInput,
  TaskUpdateInput,
  ToolResult,
} from "../types.js";
import { isTaskError } from "../errors.js";
import {
  addTask,
  completeTask,
  listTasks,
  removeTask,
  updateTask,
} from "../core/tasks.js";

/**
 * Runs an operation and reports domain errors as a failed result.
 * Anything else (I/O on save) is rethrown.
 */
export async function toToolResult<T>(
  fn: () => Promise<T>,
  describe: (data: T) => string
): Promise<ToolResult<T>> {
  try {
    const data = await fn();
    return { ok: true, message: describe(data), data };
  } catch (err) {
    if (isTaskError(err)) {
      return { ok: false, error: err.message, code: err.code };
    }
    throw err;
  }
}

function label(task: Task): string {
  return `"${task.event}" @ ${task.time}`;
}

export function taskAdd(store: TaskStore, input: TaskAddInput): Promise<ToolResult<Task>> {
  return toToolResult(
    () => addTask(store, input),
    (t) => `Added ${label(t)} worth ${t.value} point(s).`
  );
}

export function taskUpdate(store: TaskStore, input: TaskUpdateInput): Promise<ToolResult<Task>> {
  return toToolResult(
    () => updateTask(store, input),
    (t) => `Updated ${label(t)}: value -> ${t.value}.`
  );
}

export function taskRemove(store: TaskStore, input: TaskRemoveInput): Promise<ToolResult<Task>> {
  return toToolResult(
    () => removeTask(store, input),
    (t) => `Removed ${label(t)}.`
  );
}

export function taskComplete(store: TaskStore, input: TaskCompleteInput): Promise<ToolResult<Task>> {
  return toToolResult(
    () => completeTask(store, input),
    (t) => `Completed ${label(t)}.`
  );
}

export function taskList(store: TaskStore, input: TaskListInput): Promise<ToolResult<Task[]>> {
  return toToolResult(
    () => listTasks(store, input),
    (tasks) => {
      if (tasks.length === 0) return "No tasks.";
      const summary = tasks
        .map((t) => `  [${t.completed ? "x" : " "}] ${t.time} ${t.event} (${t.value})`)
        .join("\n");
      return `${tasks.length} task(s):\n${summary}`;
    }
  );
}
