import type { Notifier, ReminderMessage, RewardMessage } from "./types.js";

/** Fallback when no webhook is configured: writes the plain-text body to stderr. */
export class ConsoleNotifier implements Notifier {
  constructor(private write: (line: string) => void = (line) => console.error(line)) {}

  async sendReminder(message: ReminderMessage): Promise<void> {
    this.print(message.delivery.to, message.subject, message.text);
  }

  async sendReward(message: RewardMessage): Promise<void> {
    this.print(message.delivery.to, message.subject, message.text);
  }

  private print(to: string, subject: string, text: string): void {
    this.write(`[taskpoints] ${subject}${to ? ` -> ${to}` : ""}\n${text}`);
  }
}
