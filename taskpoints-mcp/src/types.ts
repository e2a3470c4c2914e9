import { homedir } from "node:os";
import { join } from "node:path";

// --- Enum Types (Union Types) ---

export type SortKey = "time" | "value";

export const SORT_KEYS: readonly SortKey[] = ["time", "value"];

// --- Core Models ---

/** A single tracked task. `(time, event)` identifies it within the collection. */
export interface Task {
  time: string;
  event: string;
  value: number;
  completed: boolean;
}

/**
 * Raw time input, either ISO-8601 text or a structured Date.
 * The validator converts each arm with its own rule.
 */
export type TimeInput =
  | { kind: "text"; text: string }
  | { kind: "timestamp"; date: Date };

/** Result of reading the backing file. An empty store is a normal outcome, not an error. */
export type LoadResult =
  | { kind: "parsed"; tasks: Task[] }
  | { kind: "empty"; reason: "missing" | "corrupt" };

// --- Operation Input Types ---

export interface TaskAddInput {
  time: string | Date;
  event: string;
  value: number;
}

export type TaskUpdateInput = TaskAddInput;

export interface TaskRemoveInput {
  time: string | Date;
  event: string;
}

export interface TaskCompleteInput {
  event: string;
}

export interface TaskListInput {
  orderBy?: string;
}

export interface DueSoonInput {
  windowHours: number;
  rank?: string;
  now?: Date;
}

export interface RewardInput {
  threshold: number;
  includeCompleted?: boolean;
}

// --- Evaluation Payloads ---

export interface DueSoonPayload {
  windowHours: number;
  rank: SortKey;
  tasks: Task[];
}

export type DueSoonResult =
  | { due: false }
  | { due: true; payload: DueSoonPayload };

export interface RewardPayload {
  total: number;
  threshold: number;
  completedTasks?: Task[];
}

export type RewardResult =
  | { met: false; total: number }
  | { met: true; payload: RewardPayload };

// --- Tool Output Types ---

export interface ToolResult<T = unknown> {
  ok: boolean;
  message?: string;
  error?: string;
  code?: string;
  data?: T;
}

// --- Defaults ---

/** Used only when a caller constructs a store without a path. */
export const DEFAULT_TASKS_FILE = join(homedir(), ".taskpoints.json");

export const DEFAULT_WINDOW_HOURS = 24;
