import type { Message, PushPayload } from '../shared/types.js';
import { errorMessage } from './errors.js';
import type { PushDeliveryResult, PushRelay, PushSubscriptionStore } from './push.js';
import { senderDisplayName } from './threadingUtils.js';

const QUIET_FOLDERS = new Set(['sent', 'trash', 'deleting']);
const QUIET_TAGS = new Set(['junk', 'newsletter', 'system']);

export const NOTIFICATION_TAG = 'new-email';

export const isNotifiable = (message: Message) =>
  message.isUnread
  && !QUIET_FOLDERS.has(message.folder)
  && !message.tags.some((tag) => QUIET_TAGS.has(tag));

export const buildPushPayload = (message: Message): PushPayload => ({
  title: `New email from ${senderDisplayName(message.fromAddress)}`,
  body: message.subject.trim() || '(no subject)',
  url: `/?message=${encodeURIComponent(message.id)}`,
  tag: NOTIFICATION_TAG,
});

export interface NotificationOptions {
  maxPerCycle: number;
}

export interface NotificationSummary {
  eligible: number;
  notified: number;
  delivered: number;
  removedSubscriptions: number;
  failedDeliveries: number;
}

/**
 * Sends one payload per eligible message to every subscription, capped per
 * cycle. Subscriptions the push service reports gone are deleted; other
 * failures, including a throwing relay or store, are logged and counted in
 * `failedDeliveries` without stopping the remaining deliveries.
 */
export const dispatchNotifications = async (
  messages: Message[],
  subscriptions: PushSubscriptionStore,
  relay: PushRelay | null,
  options: NotificationOptions,
): Promise<NotificationSummary> => {
  const summary: NotificationSummary = {
    eligible: 0,
    notified: 0,
    delivered: 0,
    removedSubscriptions: 0,
    failedDeliveries: 0,
  };
  if (!relay) {
    return summary;
  }

  const eligible = messages.filter(isNotifiable);
  summary.eligible = eligible.length;
  if (eligible.length === 0) {
    return summary;
  }

  let targets = await subscriptions.list();
  for (const message of eligible.slice(0, options.maxPerCycle)) {
    const payload = buildPushPayload(message);
    const gone = new Set<string>();
    for (const subscription of targets) {
      let result: PushDeliveryResult;
      try {
        result = await relay.send(subscription, payload);
      } catch (error) {
        console.warn(`[push] delivery for ${message.id} threw: ${errorMessage(error)}`);
        summary.failedDeliveries += 1;
        continue;
      }
      if (result === 'delivered') {
        summary.delivered += 1;
        await subscriptions.touch(subscription.endpoint).catch((error: unknown) => {
          console.warn(`[push] could not touch subscription: ${errorMessage(error)}`);
        });
      } else if (result === 'gone') {
        // Skipped for the rest of the cycle even if the delete fails.
        gone.add(subscription.endpoint);
        try {
          await subscriptions.remove(subscription.endpoint);
          summary.removedSubscriptions += 1;
        } catch (error) {
          console.warn(`[push] could not remove gone subscription: ${errorMessage(error)}`);
          summary.failedDeliveries += 1;
        }
      } else {
        summary.failedDeliveries += 1;
      }
    }
    targets = targets.filter((subscription) => !gone.has(subscription.endpoint));
    summary.notified += 1;
  }

  if (eligible.length > options.maxPerCycle) {
    console.log(`[push] ${eligible.length - options.maxPerCycle} notification(s) dropped by the per-cycle cap`);
  }
  return summary;
};
