export type TaskErrorCode =
  | "invalid_time"
  | "invalid_event"
  | "invalid_value"
  | "duplicate_task"
  | "not_found"
  | "invalid_sort_key";

export class TaskError extends Error {
  constructor(
    public readonly code: TaskErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TaskError";
  }

  toJSON(): { error: string; code: TaskErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}

export function isTaskError(err: unknown): err is TaskError {
  return err instanceof TaskError;
}
