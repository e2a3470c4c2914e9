import type { DueSoonPayload, RewardPayload, Task } from "../types.js";
import type { RenderedMessage } from "./types.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatTaskLine(task: Task): string {
  return `- ${task.time} | ${task.event} | ${task.value}`;
}

export function renderTaskTable(tasks: Task[]): string {
  const rows = tasks.map(
    (t) =>
      `<tr><td>${escapeHtml(t.time)}</td><td>${escapeHtml(t.event)}</td><td>${t.value}</td></tr>`
  );
  return [
    '<table border="1" cellpadding="5" cellspacing="0" style="border-collapse: collapse;">',
    "<tr><th>Time</th><th>Event</th><th>Value</th></tr>",
    ...rows,
    "</table>",
  ].join("\n");
}

export function renderReminder(payload: DueSoonPayload, addendum = ""): RenderedMessage {
  const count = payload.tasks.length;
  const headline = `You have ${count} upcoming task(s) within the next ${payload.windowHours} hour(s).`;

  const text = [
    headline,
    ...(addendum ? [addendum] : []),
    "",
    ...payload.tasks.map(formatTaskLine),
  ].join("\n");

  const html = [
    "<html>",
    "<body>",
    `<p>You have <b>${count}</b> upcoming task(s) within the next ${payload.windowHours} hour(s).</p>`,
    ...(addendum ? [`<p>${escapeHtml(addendum)}</p>`] : []),
    renderTaskTable(payload.tasks),
    "</body>",
    "</html>",
  ].join("\n");

  return { subject: "Upcoming Task Reminder", text, html };
}

export interface RewardRenderOptions {
  rewardMessage?: string;
  flavorText?: string;
}

export function renderReward(
  payload: RewardPayload,
  options: RewardRenderOptions = {}
): RenderedMessage {
  const headline = `Congratulations! You have reached ${payload.total} points, meeting your goal of ${payload.threshold}.`;
  const completed = payload.completedTasks ?? [];

  const textLines = [headline];
  if (options.rewardMessage) textLines.push(options.rewardMessage);
  if (options.flavorText) textLines.push("", options.flavorText);
  if (completed.length > 0) {
    textLines.push("", "Your completed tasks:", ...completed.map(formatTaskLine));
  }

  const htmlLines = [
    "<html>",
    "<body>",
    "<h2>Congratulations on Your Achievement!</h2>",
    `<p>You have earned a total of <b>${payload.total}</b> points, meeting your goal of <b>${payload.threshold}</b>.</p>`,
  ];
  if (options.rewardMessage) htmlLines.push(`<p>${escapeHtml(options.rewardMessage)}</p>`);
  if (options.flavorText) {
    htmlLines.push(`<p><i>Here's something to celebrate with: "${escapeHtml(options.flavorText)}"</i></p>`);
  }
  if (completed.length > 0) {
    htmlLines.push("<h3>Your Completed Tasks:</h3>", renderTaskTable(completed));
  }
  htmlLines.push("</body>", "</html>");

  return {
    subject: `Goal Achievement Reward: ${payload.total} points`,
    text: textLines.join("\n"),
    html: htmlLines.join("\n"),
  };
}
