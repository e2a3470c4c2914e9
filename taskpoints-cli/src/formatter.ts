import type { DueSoonResult, RewardResult, Task } from "taskpoints-mcp";

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const GREEN = "\x1b[32m";
const RED = "\x1b[31m";

export function formatTask(task: Task): string {
  const icon = task.completed ? "[x]" : "[ ]";
  const color = task.value < 0 ? RED : GREEN;
  return `${icon} ${DIM}${task.time}${RESET} ${task.event} ${color}(${task.value} pts)${RESET}`;
}

export function formatTaskList(tasks: Task[]): string {
  if (tasks.length === 0) return "No tasks found.";
  return tasks.map(formatTask).join("\n");
}

export function formatDueSoon(result: DueSoonResult, windowHours: number): string {
  if (!result.due) return `Nothing due within ${windowHours} hour(s).`;
  return [
    `Due within ${result.payload.windowHours} hour(s):`,
    formatTaskList(result.payload.tasks),
  ].join("\n");
}

function progressBar(total: number, threshold: number): string {
  const ratio = threshold > 0 ? total / threshold : 1;
  const filled = Math.min(10, Math.max(0, Math.round(ratio * 10)));
  return `[${"#".repeat(filled)}${"-".repeat(10 - filled)}]`;
}

export function formatReward(result: RewardResult, threshold: number): string {
  const total = result.met ? result.payload.total : result.total;
  const head = result.met ? "Goal reached!" : "Not there yet.";
  return `${head} ${total}/${threshold} points ${progressBar(total, threshold)}`;
}
