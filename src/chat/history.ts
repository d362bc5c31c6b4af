import type { HistoryEntry, JsonRecord } from '../types';

/**
 * Keep only the newest entry for each key. Entries at the end of the list are newer,
 * and the survivors stay in their original relative order.
 *
 * @example
 * ```typescript
 * pruneHistory([{ key: 'a', val: 1 }, { key: 'b', val: 2 }, { key: 'a', val: 3 }]);
 * // [{ key: 'b', val: 2 }, { key: 'a', val: 3 }]
 * ```
 */
export function pruneHistory<T extends HistoryEntry>(history: T[]): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];
  for (let i = history.length - 1; i >= 0; i--) {
    const item = history[i];
    if (!item || seen.has(item.key)) continue;
    seen.add(item.key);
    kept.push(item);
  }
  return kept.reverse();
}

/**
 * Model-ready copy of a message list. Tool messages (`role: 'tool'`) other than the last
 * `keepRecent` have their content blanked. Every other message gets a string content:
 * objects and arrays are JSON-encoded, and a missing or null content becomes `''`.
 */
export function clearToolMessageContent(messages: readonly JsonRecord[], keepRecent = 1): JsonRecord[] {
  const kept = new Set<number>();
  for (let i = messages.length - 1; i >= 0 && kept.size < keepRecent; i--) {
    if (messages[i]?.role === 'tool') kept.add(i);
  }

  return messages.map((message, i) => {
    if (message.role === 'tool' && !kept.has(i)) return { ...message, content: '' };
    const content = message.content;
    if (content === undefined || content === null) return { ...message, content: '' };
    return { ...message, content: typeof content === 'object' ? JSON.stringify(content) : String(content) };
  });
}
