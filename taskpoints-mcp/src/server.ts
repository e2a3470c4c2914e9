import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { TaskStore } from "./state/store.js";
import type { AuditLog } from "./state/audit.js";
import type { Notifier } from "./notifier/types.js";
import type { TaskpointsConfig } from "./config.js";
import type { ToolResult } from "./types.js";
import { taskAdd, taskUpdate, taskRemove, taskComplete, taskList } from "./tools/task.js";
import { remindDue, rewardCheck } from "./tools/notify.js";

export interface ServerDeps {
  store: TaskStore;
  audit: AuditLog;
  notifier: Notifier;
  config: TaskpointsConfig;
  now?: () => Date;
}

const sortKeySchema = z.enum(["time", "value"]);

export function createServer(deps: ServerDeps): McpServer {
  const { store, audit, notifier, config } = deps;
  const now = deps.now ?? (() => new Date());

  const server = new McpServer({
    name: "taskpoints-mcp",
    version: "0.1.0",
  });

  async function withAudit<T>(
    toolName: string,
    input: Record<string, unknown>,
    fn: () => Promise<ToolResult<T>>
  ) {
    const result = await fn();
    await audit.record(toolName, input, result, now());
    return {
      content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    };
  }

  const delivery = (addendum?: string) => ({
    to: config.mailTo,
    from: config.mailFrom,
    addendum,
  });

  // --- task_add ---
  server.tool(
    "task_add",
    "Add a task identified by its ISO time and event name",
    {
      time: z.string(),
      event: z.string(),
      value: z.number(),
    },
    async ({ time, event, value }) =>
      withAudit("task_add", { time, event, value }, () => taskAdd(store, { time, event, value }))
  );

  // --- task_update ---
  server.tool(
    "task_update",
    "Change the point value of an existing task",
    {
      time: z.string(),
      event: z.string(),
      value: z.number(),
    },
    async ({ time, event, value }) =>
      withAudit("task_update", { time, event, value }, () => taskUpdate(store, { time, event, value }))
  );

  // --- task_remove ---
  server.tool(
    "task_remove",
    "Remove the task with the given time and event",
    {
      time: z.string(),
      event: z.string(),
    },
    async ({ time, event }) =>
      withAudit("task_remove", { time, event }, () => taskRemove(store, { time, event }))
  );

  // --- task_complete ---
  server.tool(
    "task_complete",
    "Mark the first task with this event name as completed",
    { event: z.string() },
    async ({ event }) =>
      withAudit("task_complete", { event }, () => taskComplete(store, { event }))
  );

  // --- task_list ---
  server.tool(
    "task_list",
    "List tasks by time (ascending) or value (descending)",
    { orderBy: sortKeySchema.optional() },
    async ({ orderBy }) =>
      withAudit("task_list", { orderBy }, () => taskList(store, { orderBy }))
  );

  // --- remind_due ---
  server.tool(
    "remind_due",
    "Notify about incomplete tasks due within the window (overdue included)",
    {
      windowHours: z.number().optional(),
      rank: sortKeySchema.optional(),
      addendum: z.string().optional(),
    },
    async ({ windowHours, rank, addendum }) => {
      const hours = windowHours ?? config.windowHours;
      return withAudit("remind_due", { windowHours: hours, rank }, () =>
        remindDue(store, notifier, { windowHours: hours, rank, now: now(), delivery: delivery(addendum) })
      );
    }
  );

  // --- reward_check ---
  server.tool(
    "reward_check",
    "Send a reward notification when completed points reach the threshold",
    {
      threshold: z.number(),
      includeCompleted: z.boolean().optional(),
      includeFlavor: z.boolean().optional(),
      rewardMessage: z.string().optional(),
    },
    async ({ threshold, includeCompleted, includeFlavor, rewardMessage }) =>
      withAudit("reward_check", { threshold, includeCompleted, includeFlavor }, () =>
        rewardCheck(store, notifier, {
          threshold,
          includeCompleted,
          includeFlavor,
          rewardMessage,
          delivery: delivery(),
        })
      )
  );

  return server;
}
