import { z } from "zod";
import { DEFAULT_TASKS_FILE, DEFAULT_WINDOW_HOURS } from "./types.js";

const envSchema = z.object({
  TASKPOINTS_FILE: z.string().min(1).default(DEFAULT_TASKS_FILE),
  TASKPOINTS_WEBHOOK_URL: z.string().url().optional(),
  TASKPOINTS_WEBHOOK_TOKEN: z.string().optional(),
  TASKPOINTS_MAIL_TO: z.string().default(""),
  TASKPOINTS_MAIL_FROM: z.string().default("taskpoints@localhost"),
  TASKPOINTS_WINDOW_HOURS: z.coerce.number().positive().default(DEFAULT_WINDOW_HOURS),
});

export interface TaskpointsConfig {
  tasksFile: string;
  webhookUrl?: string;
  webhookToken?: string;
  mailTo: string;
  mailFrom: string;
  windowHours: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TaskpointsConfig {
  const parsed = envSchema.parse(env);
  return {
    tasksFile: parsed.TASKPOINTS_FILE,
    webhookUrl: parsed.TASKPOINTS_WEBHOOK_URL,
    webhookToken: parsed.TASKPOINTS_WEBHOOK_TOKEN,
    mailTo: parsed.TASKPOINTS_MAIL_TO,
    mailFrom: parsed.TASKPOINTS_MAIL_FROM,
    windowHours: parsed.TASKPOINTS_WINDOW_HOURS,
  };
}
