import type { SyncHeuristicsConfig } from '@weighbridge/shared-config';
import { FilterRejectionReason, type SourceMessage } from '@weighbridge/shared-types';

export type MessageFilterConfig = Pick<SyncHeuristicsConfig, 'expectedSender' | 'senderAliases' | 'subjectKeywordGroups'>;

export type FilterDecision = { accepted: true } | { accepted: false; reason: FilterRejectionReason };

/**
 * Sender predicate. Mail clients do not always expose the SMTP address, so
 * the display name is checked too, and any configured alias (local part,
 * domain, short name) is accepted as a substring of either.
 */
export function matchesSender(
  message: Pick<SourceMessage, 'senderAddress' | 'senderDisplayName'>,
  config: Pick<MessageFilterConfig, 'expectedSender' | 'senderAliases'>
): boolean {
  const expected = config.expectedSender.trim().toLowerCase();
  const candidates = [message.senderAddress, message.senderDisplayName]
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);

  if (expected && candidates.includes(expected)) {
    return true;
  }

  return candidates.some((candidate) =>
    config.senderAliases.some((alias) => {
      const needle = alias.trim().toLowerCase();
      return needle.length > 0 && candidate.includes(needle);
    })
  );
}

function alternativeMatches(subject: string, alternative: string): boolean {
  const words = alternative.toLowerCase().split(/\s+/).filter(Boolean);
  return words.length > 0 && words.every((word) => subject.includes(word));
}

/**
 * Subject predicate: every group must match, and a group matches when all
 * words of one of its alternatives appear in the subject.
 *
 * @example
 * matchesSubject('Weigh Bridge Repot 05-Jan', [['weigh bridge', 'weighbridge'], ['report', 'repot']])
 * // true
 */
export function matchesSubject(subject: string, keywordGroups: string[][]): boolean {
  const normalized = subject.toLowerCase();
  return keywordGroups.every((group) => group.some((alternative) => alternativeMatches(normalized, alternative)));
}

export function filterMessage(message: SourceMessage, config: MessageFilterConfig): FilterDecision {
  if (!matchesSender(message, config)) {
    return { accepted: false, reason: FilterRejectionReason.SENDER_MISMATCH };
  }
  if (!matchesSubject(message.subject, config.subjectKeywordGroups)) {
    return { accepted: false, reason: FilterRejectionReason.SUBJECT_MISMATCH };
  }
  return { accepted: true };
}
