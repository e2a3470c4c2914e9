import type { TaskStore } from "../state/store.js";
import type { DueSoonPayload, RewardPayload, ToolResult } from "../types.js";
import type { DeliveryParams, FlavorSource, Notifier } from "../notifier/types.js";
import { evaluateDueSoon, evaluateReward } from "../core/notify.js";
import { renderReminder, renderReward } from "../notifier/render.js";
import { randomQuip } from "../notifier/flavor.js";
import { toToolResult } from "./task.js";

// --- remind_due ---

export interface RemindDueOptions {
  windowHours: number;
  rank?: string;
  now?: Date;
  delivery: DeliveryParams;
}

/** Delivery errors propagate; there is no retry. */
export async function remindDue(
  store: TaskStore,
  notifier: Notifier,
  options: RemindDueOptions
): Promise<ToolResult<DueSoonPayload | null>> {
  return toToolResult(
    async () => {
      const result = await evaluateDueSoon(store, options);
      if (!result.due) return null;

      const rendered = renderReminder(result.payload, options.delivery.addendum);
      await notifier.sendReminder({
        ...rendered,
        delivery: options.delivery,
        payload: result.payload,
      });
      return result.payload;
    },
    (payload) =>
      payload
        ? `Reminder sent for ${payload.tasks.length} task(s) due within ${payload.windowHours} hour(s).`
        : "No upcoming tasks."
  );
}

// --- reward_check ---

export interface RewardCheckOptions {
  threshold: number;
  includeCompleted?: boolean;
  includeFlavor?: boolean;
  rewardMessage?: string;
  delivery: DeliveryParams;
  flavor?: FlavorSource;
}

export const DEFAULT_REWARD_MESSAGE = "Congratulations on reaching your goal!";

/**
 * Sends a reward notification when completed value meets the threshold.
 * A failed delivery is reported in the result rather than thrown.
 */
export async function rewardCheck(
  store: TaskStore,
  notifier: Notifier,
  options: RewardCheckOptions
): Promise<ToolResult<RewardPayload>> {
  const evaluated = await toToolResult(
    () => evaluateReward(store, options),
    (r) => (r.met ? `Reached ${r.payload.total} point(s).` : `Total ${r.total} point(s).`)
  );
  if (!evaluated.ok || !evaluated.data) {
    return { ok: false, error: evaluated.error, code: evaluated.code };
  }

  const result = evaluated.data;
  if (!result.met) {
    return {
      ok: false,
      error: `Threshold not met: ${result.total} of ${options.threshold} point(s).`,
      code: "threshold_not_met",
    };
  }

  let flavorText: string | undefined;
  if (options.includeFlavor ?? true) {
    try {
      flavorText = await (options.flavor ?? randomQuip)();
    } catch (err) {
      console.error(`[taskpoints] flavor text unavailable: ${String(err)}`);
    }
  }

  const rendered = renderReward(result.payload, {
    rewardMessage: options.rewardMessage ?? DEFAULT_REWARD_MESSAGE,
    flavorText,
  });

  try {
    await notifier.sendReward({
      ...rendered,
      delivery: options.delivery,
      payload: result.payload,
      flavorText,
    });
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    console.error(`[taskpoints] failed to send reward notification: ${error}`);
    return { ok: false, error, code: "delivery_failed", data: result.payload };
  }

  return {
    ok: true,
    message: `Reward sent: ${result.payload.total} point(s) reached (goal ${result.payload.threshold}).`,
    data: result.payload,
  };
}
