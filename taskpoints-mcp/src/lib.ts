export type {
  Task,
  TimeInput,
  LoadResult,
  SortKey,
  TaskAddInput,
  TaskUpdateInput,
  TaskRemoveInput,
  TaskCompleteInput,
  TaskListInput,
  DueSoonInput,
  DueSoonPayload,
  DueSoonResult,
  RewardInput,
  RewardPayload,
  RewardResult,
  ToolResult,
} from "./types.js";
export { DEFAULT_TASKS_FILE, DEFAULT_WINDOW_HOURS, SORT_KEYS } from "./types.js";
export { TaskError, isTaskError } from "./errors.js";
export type { TaskErrorCode } from "./errors.js";
export { parseIsoTime, formatTimestamp } from "./time.js";
export { validateTask, toTimeInput, normalizeTime } from "./validate.js";
export { TaskStore } from "./state/store.js";
export { addTask, updateTask, removeTask, completeTask, listTasks } from "./core/tasks.js";
export { evaluateDueSoon, evaluateReward } from "./core/notify.js";
export type {
  Notifier,
  DeliveryParams,
  ReminderMessage,
  RewardMessage,
  FlavorSource,
} from "./notifier/types.js";
export { renderReminder, renderReward } from "./notifier/render.js";
export { WebhookNotifier } from "./notifier/webhook.js";
export { ConsoleNotifier } from "./notifier/console.js";
export { randomQuip, quipSource } from "./notifier/flavor.js";
export { remindDue, rewardCheck } from "./tools/notify.js";
export { loadConfig } from "./config.js";
export type { TaskpointsConfig } from "./config.js";
