import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { ToolResult } from "../types.js";

export const AUDIT_FILE_NAME = "taskpoints-audit.jsonl";

const auditEntrySchema = z.object({
  ts: z.string(),
  tool: z.string(),
  input: z.record(z.unknown()),
  ok: z.boolean(),
  code: z.string().optional(),
  error: z.string().optional(),
});

export type AuditEntry = z.infer<typeof auditEntrySchema>;

/** Append-only JSONL record of tool calls, kept beside the task file. */
export class AuditLog {
  private filePath: string;

  constructor(tasksFile: string) {
    this.filePath = join(dirname(tasksFile), AUDIT_FILE_NAME);
  }

  getFilePath(): string {
    return this.filePath;
  }

  /** Appends one line for a finished tool call. Write failures are logged, never thrown. */
  async record(
    tool: string,
    input: Record<string, unknown>,
    result: Pick<ToolResult, "ok" | "code" | "error">,
    at: Date = new Date()
  ): Promise<void> {
    const entry: AuditEntry = { ts: at.toISOString(), tool, input, ok: result.ok };
    if (result.code !== undefined) entry.code = result.code;
    if (result.error !== undefined) entry.error = result.error;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
    } catch (err) {
      console.error(`[taskpoints] audit write failed for ${tool}: ${String(err)}`);
    }
  }

  /** Entries in write order. Lines that are not audit entries are skipped. */
  async entries(): Promise<AuditEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }

    const entries: AuditEntry[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        continue;
      }
      const result = auditEntrySchema.safeParse(parsed);
      if (result.success) entries.push(result.data);
    }
    return entries;
  }
}
