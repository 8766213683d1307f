import type { Message, MessagePriority } from '../shared/types.js';
import { InferenceError, errorMessage } from './errors.js';
import type { InferenceClient } from './inference.js';
import type { LabelSyncOptions } from './labelSync.js';
import { computeLabelChange, isEmptyLabelChange } from './labelSync.js';
import type { MailboxStore } from './mailboxStore.js';
import { readArray } from './providers/json.js';

export interface TagDefinition {
  name: string;
  description: string;
}

export const DEFAULT_TAXONOMY: readonly TagDefinition[] = [
  { name: 'important', description: 'Needs attention from the reader' },
  { name: 'personal', description: 'Personal correspondence' },
  { name: 'work', description: 'Work-related email' },
  { name: 'finance', description: 'Bills, banking, invoices and payments' },
  { name: 'shopping', description: 'Orders, receipts and shipping updates' },
  { name: 'travel', description: 'Bookings, itineraries and flights' },
  { name: 'dev', description: 'Developer and CI notifications' },
  { name: 'social', description: 'Social network notifications' },
  { name: 'newsletter', description: 'Newsletters and mailing lists' },
  { name: 'junk', description: 'Spam, scams and unwanted promotions' },
  { name: 'neutral', description: 'Nothing else fits' },
];

export const FALLBACK_TAG = 'neutral';
export const DEFAULT_CONFIDENCE = 0.8;
const REPLY_TEMPERATURE = 0.7;
const MAX_REPLIES = 4;
const MAX_REPLY_LENGTH = 200;

export interface ClassificationResult {
  tags: string[];
  confidence: number;
  priority: MessagePriority;
  actionRequired: boolean;
  canArchive: boolean;
}

const messageContext = (message: Message, maxContextChars: number) => {
  const body = (message.bodyText ?? message.snippet).replace(/\s+/g, ' ').trim().slice(0, maxContextChars);
  return [
    `Subject: ${message.subject || '(no subject)'}`,
    `From: ${message.fromAddress}`,
    `Snippet: ${body}`,
  ].join('\n');
};

export const buildClassificationPrompt = (
  message: Message,
  taxonomy: readonly TagDefinition[],
  maxContextChars: number,
) => `You sort email into tags. Pick one or more tags from this list only:
${taxonomy.map((tag) => `- ${tag.name}: ${tag.description}`).join('\n')}

${messageContext(message, maxContextChars)}

Also decide:
- priority: "high" only when the reader should look at it today, otherwise "normal"
- action_required: true when the reader has to reply, pay, sign or otherwise act
- can_archive: true when the message needs no further attention once read

Respond with JSON only, shaped as {"tags": ["tag"], "confidence": 0.0-1.0, "priority": "high|normal", "action_required": false, "can_archive": false}.`;

export const buildReplyPrompt = (message: Message, maxContextChars: number) =>
  `Suggest 3 or 4 short replies (under 15 words each) the recipient could send to this email.

${messageContext(message, maxContextChars)}

Respond with JSON only, shaped as {"replies": ["reply"]}.`;

/** Lower-cases, de-duplicates and filters onto the taxonomy; never empty. */
export const normalizeTags = (raw: unknown[], allowed: ReadonlySet<string>): string[] => {
  const tags: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== 'string') continue;
    const tag = entry.trim().toLowerCase();
    if (allowed.has(tag) && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags.length > 0 ? tags : [FALLBACK_TAG];
};

export const clampConfidence = (value: unknown): number => {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    return DEFAULT_CONFIDENCE;
  }
  return Math.max(0, Math.min(1, parsed));
};

export const parseClassification = (
  output: Record<string, unknown>,
  allowed: ReadonlySet<string>,
): ClassificationResult => {
  const rawTags = Array.isArray(output.tags)
    ? readArray(output, 'tags')
    : typeof output.category === 'string'
      ? [output.category]
      : null;
  if (!rawTags) {
    throw new InferenceError('malformed', 'model output has neither "tags" nor "category"');
  }
  return {
    tags: normalizeTags(rawTags, allowed),
    confidence: clampConfidence(output.confidence),
    priority: output.priority === 'high' ? 'high' : 'normal',
    actionRequired: output.action_required === true || output.todo === true,
    canArchive: output.can_archive === true,
  };
};

export interface ClassificationOptions {
  enabled: boolean;
  maxPerCycle: number;
  maxContextChars: number;
  taxonomy?: readonly TagDefinition[];
  labels: LabelSyncOptions;
}

export interface ClassificationSummary {
  attempted: number;
  classified: number;
  failed: number;
  labelsQueued: number;
}

/** Queues a push of the new classification as provider labels, when it changes anything. */
const queueLabelPush = async (store: MailboxStore, message: Message, labels: LabelSyncOptions) => {
  if (!labels.enabled || isEmptyLabelChange(computeLabelChange(message, labels.prefix))) {
    return false;
  }
  const operation = await store.enqueueOperation(message.accountId, message.id, 'apply_labels', () => ({}));
  return operation !== null;
};

/**
 * Tags the account's messages that still carry the needs-classification
 * marker. Each message is independent; a failed inference leaves the marker
 * in place and bumps the message's attempt count, so the next cycle tries
 * it again after mail that has failed less often.
 */
export const classifyPendingMessages = async (
  store: MailboxStore,
  client: InferenceClient,
  accountId: string,
  options: ClassificationOptions,
): Promise<ClassificationSummary> => {
  const summary: ClassificationSummary = { attempted: 0, classified: 0, failed: 0, labelsQueued: 0 };
  if (!options.enabled) {
    return summary;
  }

  const taxonomy = options.taxonomy ?? DEFAULT_TAXONOMY;
  const allowed = new Set(taxonomy.map((tag) => tag.name));
  const candidates = await store.listMessagesNeedingClassification(accountId, options.maxPerCycle);

  for (const message of candidates) {
    if (message.tagSource === 'manual') continue;
    summary.attempted += 1;
    let result: ClassificationResult;
    try {
      const output = await client.generateJson(buildClassificationPrompt(message, taxonomy, options.maxContextChars));
      result = parseClassification(output, allowed);
      if (!(await store.applyClassification(accountId, message.id, result))) {
        continue;
      }
      summary.classified += 1;
    } catch (error) {
      summary.failed += 1;
      const reason = error instanceof InferenceError ? error.reason : 'store';
      console.warn(`[classify] ${accountId}/${message.id} left untagged (${reason}): ${errorMessage(error)}`);
      await store.recordClassificationFailure(accountId, message.id).catch((recordError: unknown) => {
        console.warn(`[classify] recording failure for ${accountId}/${message.id}: ${errorMessage(recordError)}`);
      });
      continue;
    }

    try {
      if (await queueLabelPush(store, { ...message, ...result }, options.labels)) {
        summary.labelsQueued += 1;
      }
    } catch (error) {
      console.warn(`[classify] queueing labels for ${accountId}/${message.id} failed: ${errorMessage(error)}`);
    }
  }

  return summary;
};

/** Short reply suggestions; any failure yields an empty list. */
export const suggestReplies = async (
  client: InferenceClient,
  message: Message,
  maxContextChars: number,
): Promise<string[]> => {
  try {
    const output = await client.generateJson(buildReplyPrompt(message, maxContextChars), {
      temperature: REPLY_TEMPERATURE,
    });
    return readArray(output, 'replies')
      .filter((reply): reply is string => typeof reply === 'string')
      .map((reply) => reply.trim().slice(0, MAX_REPLY_LENGTH))
      .filter(Boolean)
      .slice(0, MAX_REPLIES);
  } catch (error) {
    console.warn(`[classify] reply suggestions failed for ${message.id}: ${errorMessage(error)}`);
    return [];
  }
};
