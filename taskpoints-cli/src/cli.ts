import {
  TaskStore,
  addTask,
  completeTask,
  evaluateDueSoon,
  evaluateReward,
  isTaskError,
  listTasks,
  removeTask,
  updateTask,
  DEFAULT_WINDOW_HOURS,
} from "taskpoints-mcp";
import { formatDueSoon, formatReward, formatTask, formatTaskList } from "./formatter.js";

const HELP = `
taskpoints - Point-scored task tracking

Usage:
  taskpoints add <time> <event> --value N        Add a task (time in ISO format)
  taskpoints update <time> <event> --value N     Change a task's point value
  taskpoints remove <time> <event>               Remove a task
  taskpoints done <event>                        Mark the first task with this event completed
  taskpoints list [--order time|value]           List tasks
  taskpoints remind [--window H] [--rank time|value]
                                                 Show incomplete tasks due within H hours
  taskpoints reward --threshold N                Check completed points against a goal
  taskpoints help                                Show this help

Flags take "--name value" or "--name=value". Put "--" before an event name
that starts with dashes.
`.trim();

export interface RunOptions {
  now?: () => Date;
}

interface ParsedArgs {
  command: string;
  /** Words that are not flags, in order. Event names may span several. */
  words: string[];
  flags: Map<string, string>;
}

/**
 * `--name value` and `--name=value` set a flag. After a bare `--` every
 * argument is a word, so an event name may itself start with dashes.
 */
function parseArgs(args: string[]): ParsedArgs {
  const [command = "help", ...rest] = args;
  const words: string[] = [];
  const flags = new Map<string, string>();

  let wordsOnly = false;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (wordsOnly || !arg.startsWith("--")) {
      words.push(arg);
    } else if (arg === "--") {
      wordsOnly = true;
    } else {
      const eq = arg.indexOf("=");
      if (eq === -1) {
        flags.set(arg.slice(2), rest[++i] ?? "");
      } else {
        flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      }
    }
  }

  return { command, words, flags };
}

function numberFlag(flags: Map<string, string>, name: string): number | undefined {
  const raw = flags.get(name);
  return raw ? Number(raw) : undefined;
}

export async function run(args: string[], storePath: string, options: RunOptions = {}): Promise<string> {
  const store = new TaskStore(storePath);
  try {
    return await dispatch(store, args, options);
  } catch (err) {
    if (isTaskError(err)) return `Error: ${err.message}`;
    throw err;
  }
}

async function dispatch(store: TaskStore, args: string[], options: RunOptions): Promise<string> {
  const { command, words, flags } = parseArgs(args);
  const [time, ...rest] = words;
  const event = rest.join(" ");

  switch (command) {
    case "add": {
      if (!time || !event) return "Error: time and event are required.\n\n" + HELP;
      const value = numberFlag(flags, "value");
      if (value === undefined) return "Error: --value is required.";
      const task = await addTask(store, { time, event, value });
      return `Added: ${formatTask(task)}`;
    }

    case "update": {
      if (!time || !event) return "Error: time and event are required.";
      const value = numberFlag(flags, "value");
      if (value === undefined) return "Error: --value is required.";
      const task = await updateTask(store, { time, event, value });
      return `Updated: ${formatTask(task)}`;
    }

    case "remove": {
      if (!time || !event) return "Error: time and event are required.";
      const task = await removeTask(store, { time, event });
      return `Removed: ${formatTask(task)}`;
    }

    case "done": {
      const name = words.join(" ");
      if (!name) return "Error: event is required.";
      const task = await completeTask(store, { event: name });
      return `Completed: ${formatTask(task)}`;
    }

    case "list": {
      const tasks = await listTasks(store, { orderBy: flags.get("order") });
      return formatTaskList(tasks);
    }

    case "remind": {
      const windowHours = numberFlag(flags, "window") ?? DEFAULT_WINDOW_HOURS;
      const result = await evaluateDueSoon(store, {
        windowHours,
        rank: flags.get("rank"),
        now: options.now?.(),
      });
      return formatDueSoon(result, windowHours);
    }

    case "reward": {
      const threshold = numberFlag(flags, "threshold");
      if (threshold === undefined) return "Error: --threshold is required.";
      const result = await evaluateReward(store, { threshold });
      return formatReward(result, threshold);
    }

    case "help":
      return HELP;

    default:
      return `Unknown command: ${command}\n\n${HELP}`;
  }
}
