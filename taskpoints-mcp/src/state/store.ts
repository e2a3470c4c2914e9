import { readFile, writeFile, rename, mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { LoadResult, Task } from "../types.js";
import { DEFAULT_TASKS_FILE } from "../types.js";

const taskFileSchema = z.array(
  z.object({
    time: z.string(),
    event: z.string(),
    value: z.number(),
    completed: z.boolean().default(false),
  })
);

/**
 * Whole-file JSON store. Holds only its location: every call re-reads the
 * file, and `save` replaces it in one rename.
 */
export class TaskStore {
  private filePath: string;

  constructor(filePath: string = DEFAULT_TASKS_FILE) {
    this.filePath = resolve(filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<LoadResult> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissing(err)) return { kind: "empty", reason: "missing" };
      console.error(`[taskpoints] cannot read task file ${this.filePath}: ${String(err)}`);
      return { kind: "empty", reason: "corrupt" };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      await this.backupCorrupt(raw);
      return { kind: "empty", reason: "corrupt" };
    }

    const result = taskFileSchema.safeParse(parsed);
    if (!result.success) {
      await this.backupCorrupt(raw);
      return { kind: "empty", reason: "corrupt" };
    }
    return { kind: "parsed", tasks: result.data };
  }

  async loadTasks(): Promise<Task[]> {
    const result = await this.load();
    return result.kind === "parsed" ? result.tasks : [];
  }

  async save(tasks: Task[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp.${process.pid}`;
    await writeFile(tmp, JSON.stringify(tasks, null, 2), "utf-8");
    await rename(tmp, this.filePath);
  }

  // keep the unreadable content before the next save replaces it
  private async backupCorrupt(raw: string): Promise<void> {
    const backupPath = `${this.filePath}.corrupt.${Date.now()}`;
    try {
      await writeFile(backupPath, raw, "utf-8");
      console.error(`[taskpoints] task file is corrupt, backed up to ${backupPath}`);
    } catch (err) {
      console.error(`[taskpoints] corrupt task file backup failed: ${String(err)}`);
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
