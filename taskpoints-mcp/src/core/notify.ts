import type { TaskStore } from "../state/store.js";
import type {
  DueSoonInput,
  DueSoonResult,
  RewardInput,
  RewardPayload,
  RewardResult,
  SortKey,
  Task,
} from "../types.js";
import { TaskError } from "../errors.js";
import { parseIsoTime } from "../time.js";

const HOUR_MS = 3_600_000;

/**
 * Incomplete tasks whose time is at most `windowHours` away. Overdue tasks
 * have a negative distance and are always included.
 */
export async function evaluateDueSoon(
  store: TaskStore,
  input: DueSoonInput
): Promise<DueSoonResult> {
  if (!Number.isFinite(input.windowHours)) {
    throw new TaskError("invalid_value", `Window must be a number of hours, got ${input.windowHours}`);
  }
  const rank: SortKey = input.rank === "value" ? "value" : "time";
  const now = (input.now ?? new Date()).getTime();

  const upcoming: Array<{ task: Task; at: number }> = [];
  for (const task of await store.loadTasks()) {
    if (task.completed) continue;
    const at = parseIsoTime(task.time);
    if (!at) {
      console.error(`[taskpoints] skipping task '${task.event}' with unparseable time '${task.time}'`);
      continue;
    }
    if ((at.getTime() - now) / HOUR_MS <= input.windowHours) {
      upcoming.push({ task, at: at.getTime() });
    }
  }

  if (upcoming.length === 0) return { due: false };

  if (rank === "value") {
    upcoming.sort((a, b) => a.task.value - b.task.value);
  } else {
    upcoming.sort((a, b) => a.at - b.at);
  }

  return {
    due: true,
    payload: {
      windowHours: input.windowHours,
      rank,
      tasks: upcoming.map((u) => u.task),
    },
  };
}

/** Sums `value` over completed tasks. Never writes to the store. */
export async function evaluateReward(
  store: TaskStore,
  input: RewardInput
): Promise<RewardResult> {
  if (!Number.isInteger(input.threshold)) {
    throw new TaskError("invalid_value", `Threshold must be an integer, got ${input.threshold}`);
  }

  const completed = (await store.loadTasks()).filter((t) => t.completed);
  const total = completed.reduce((sum, t) => sum + t.value, 0);

  if (total < input.threshold) return { met: false, total };

  const payload: RewardPayload = { total, threshold: input.threshold };
  if (input.includeCompleted ?? true) {
    payload.completedTasks = completed;
  }
  return { met: true, payload };
}
