import type { Notifier, ReminderMessage, RewardMessage } from "./types.js";

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number }>;

export interface WebhookNotifierOptions {
  url: string;
  token?: string;
  fetchImpl?: FetchLike;
}

/** Posts rendered messages as JSON to a mail relay or chat webhook. */
export class WebhookNotifier implements Notifier {
  private url: string;
  private token: string | undefined;
  private fetchImpl: FetchLike;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async sendReminder(message: ReminderMessage): Promise<void> {
    await this.post("reminder", message);
  }

  async sendReward(message: RewardMessage): Promise<void> {
    await this.post("reward", message);
  }

  private async post(kind: "reminder" | "reward", message: ReminderMessage | RewardMessage): Promise<void> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    console.error(
      `[taskpoints] sending ${kind} to=${message.delivery.to} tasks=${countTasks(message)}`
    );

    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers,
      body: JSON.stringify({
        kind,
        to: message.delivery.to,
        from: message.delivery.from,
        subject: message.subject,
        text: message.text,
        html: message.html,
      }),
    });

    if (!response.ok) {
      throw new Error(`Notifier webhook returned ${response.status}`);
    }
  }
}

function countTasks(message: ReminderMessage | RewardMessage): number {
  return "tasks" in message.payload
    ? message.payload.tasks.length
    : message.payload.completedTasks?.length ?? 0;
}
