import type { DueSoonPayload, RewardPayload } from "../types.js";

export interface DeliveryParams {
  to: string;
  from: string;
  addendum?: string;
}

export interface RenderedMessage {
  subject: string;
  text: string;
  html: string;
}

export interface ReminderMessage extends RenderedMessage {
  delivery: DeliveryParams;
  payload: DueSoonPayload;
}

export interface RewardMessage extends RenderedMessage {
  delivery: DeliveryParams;
  payload: RewardPayload;
  flavorText?: string;
}

/** Delivery side of notifications. Implementations throw when delivery fails. */
export interface Notifier {
  sendReminder(message: ReminderMessage): Promise<void>;
  sendReward(message: RewardMessage): Promise<void>;
}

/** Supplies a line of light-hearted text for reward messages. */
export type FlavorSource = () => Promise<string>;
