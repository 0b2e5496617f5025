/**
 * Extraction and merging of A2A message parts.
 *
 * @module a2a/parts
 */

import { TERMINAL_TASK_STATES } from './types.js';
import type { Message, Part, Task, UnifiedResponse } from './types.js';

export type DataMergeMode = 'smart' | 'last';

export interface ExtractedParts {
  textParts: string[];
  dataParts: Record<string, unknown>[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collect(parts: readonly Part[], into: ExtractedParts): void {
  for (const part of parts) {
    if (part.kind === 'text' && part.text) {
      into.textParts.push(part.text);
    } else if (part.kind === 'data' && Object.keys(part.data).length > 0) {
      into.dataParts.push(part.data);
    }
  }
}

function isEmpty(extracted: ExtractedParts): boolean {
  return extracted.textParts.length === 0 && extracted.dataParts.length === 0;
}

/**
 * Pull text and data out of a task or message.
 *
 * For a task, artifacts are authoritative. Without artifacts the most
 * recent agent message in the history is used, then the status message.
 */
export function extractParts(result: Task | Message): ExtractedParts {
  const extracted: ExtractedParts = { textParts: [], dataParts: [] };

  if (result.kind === 'message') {
    collect(result.parts, extracted);
    return extracted;
  }

  for (const artifact of result.artifacts ?? []) {
    collect(artifact.parts, extracted);
  }
  if (!isEmpty(extracted)) {
    return extracted;
  }

  const lastAgentMessage = [...(result.history ?? [])].reverse().find((message) => message.role === 'agent');
  if (lastAgentMessage) {
    collect(lastAgentMessage.parts, extracted);
    if (!isEmpty(extracted)) {
      return extracted;
    }
  }

  if (result.status.message) {
    collect(result.status.message.parts, extracted);
  }
  return extracted;
}

/**
 * Append `next` to `existing`, dropping the longest suffix/prefix overlap.
 *
 * Streaming agents may resend text they already sent, either as the full
 * accumulated text or as an overlapping chunk.
 */
export function mergeIncrementalText(existing: string, next: string): string {
  if (!existing) {
    return next;
  }
  if (next.startsWith(existing)) {
    return next;
  }
  if (existing.startsWith(next)) {
    return existing;
  }

  for (let overlap = Math.min(existing.length, next.length); overlap > 0; overlap--) {
    if (existing.endsWith(next.slice(0, overlap))) {
      return existing + next.slice(overlap);
    }
  }
  return existing + next;
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'undefined';
}

function dedupe(items: unknown[]): unknown[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const key = stableStringify(item);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Merge several data parts into one object.
 *
 * - `last`: the final part wins
 * - `smart`: lists are concatenated without duplicates, objects merge
 *   recursively, any other value is taken from the later part
 */
export function mergeDataParts(
  parts: readonly Record<string, unknown>[],
  mode: DataMergeMode = 'smart'
): Record<string, unknown> {
  if (parts.length === 0) {
    return {};
  }
  if (mode === 'last') {
    return { ...parts[parts.length - 1] };
  }

  const result: Record<string, unknown> = {};
  for (const part of parts) {
    for (const [key, value] of Object.entries(part)) {
      const current = result[key];
      if (!(key in result)) {
        result[key] = value;
      } else if (Array.isArray(current) && Array.isArray(value)) {
        result[key] = dedupe([...current, ...value]);
      } else if (isRecord(current) && isRecord(value)) {
        result[key] = mergeDataParts([current, value], mode);
      } else {
        result[key] = value;
      }
    }
  }
  return result;
}

/**
 * Reduce a task or message to merged text and data.
 */
export function toUnifiedResponse(result: Task | Message, mode: DataMergeMode = 'smart'): UnifiedResponse {
  const { textParts, dataParts } = extractParts(result);
  const text = textParts.reduce(mergeIncrementalText, '');
  const data = dataParts.length > 0 ? mergeDataParts(dataParts, mode) : null;

  if (result.kind === 'message') {
    return {
      taskId: result.taskId,
      contextId: result.contextId,
      state: 'completed',
      text,
      data,
      dataParts,
      final: true,
    };
  }

  return {
    taskId: result.id,
    contextId: result.contextId,
    state: result.status.state,
    text,
    data,
    dataParts,
    final: TERMINAL_TASK_STATES.includes(result.status.state),
  };
}
