/**
 * Header helpers shared by the providers and the notification payloads.
 * Pure functions, unit-tested without a database.
 */

export const normalizeMessageId = (value?: string | null): string | null => {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const stripped = trimmed.replace(/^<+|>+$/g, '').trim();
  return stripped ? stripped.toLowerCase() : null;
};

export const parseReferenceIds = (header?: string | null): string[] => {
  const matches = (header ?? '').match(/<[^<>]+>/g) ?? [];
  const ids = matches
    .map((value) => normalizeMessageId(value))
    .filter((value): value is string => Boolean(value));
  return Array.from(new Set(ids));
};

/**
 * Thread root for a message: the oldest referenced id, then the parent,
 * then the message itself.
 */
export const resolveThreadId = (
  messageId: string | null,
  inReplyTo?: string | null,
  references?: string | null,
): string | null => {
  const [root] = parseReferenceIds(references);
  return root ?? normalizeMessageId(inReplyTo) ?? messageId;
};

const extractEmails = (header?: string | null): string[] => {
  const matches = (header ?? '').match(/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g) ?? [];
  return Array.from(new Set(matches.map((value) => value.toLowerCase())));
};

/** Display name of a `Name <addr>` header, or the bare address. */
export const senderDisplayName = (fromHeader: string): string => {
  const trimmed = fromHeader.trim();
  const match = trimmed.match(/^"?([^"<]*?)"?\s*<[^>]+>$/);
  if (match && match[1].trim()) {
    return match[1].trim();
  }
  const [address] = extractEmails(trimmed);
  return address ?? (trimmed || 'unknown sender');
};
