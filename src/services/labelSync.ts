import type { Message } from '../shared/types.js';

export const DEFAULT_LABEL_PREFIX = 'AI';

export interface LabelSyncOptions {
  enabled: boolean;
  prefix: string;
}

/** Provider label edit derived from a message's classification. */
export interface LabelChange {
  add: string[];
  remove: string[];
  /** Take the message out of the inbox where the provider supports it. */
  archive: boolean;
}

const capitalize = (value: string) => value.charAt(0).toUpperCase() + value.slice(1);

/** Labels a classified message should carry, e.g. `AI/Work`, `AI/Priority`, `AI/ToDo`. */
export const desiredLabels = (
  message: Pick<Message, 'tags' | 'priority' | 'actionRequired'>,
  prefix: string,
): string[] => {
  const labels = message.tags.map((tag) => `${prefix}/${capitalize(tag)}`);
  if (message.priority === 'high') labels.push(`${prefix}/Priority`);
  if (message.actionRequired) labels.push(`${prefix}/ToDo`);
  return [...new Set(labels)];
};

export const computeLabelChange = (
  message: Pick<Message, 'tags' | 'priority' | 'actionRequired' | 'canArchive' | 'folder' | 'syncedLabels'>,
  prefix: string,
): LabelChange => {
  const desired = desiredLabels(message, prefix);
  const synced = new Set(message.syncedLabels);
  return {
    add: desired.filter((label) => !synced.has(label)),
    remove: message.syncedLabels.filter((label) => !desired.includes(label)),
    archive: message.canArchive && message.folder === 'inbox',
  };
};

export const isEmptyLabelChange = (change: LabelChange) =>
  change.add.length === 0 && change.remove.length === 0 && !change.archive;
