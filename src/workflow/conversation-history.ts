/**
 * Per-context conversation history.
 *
 * @module workflow/conversation-history
 */

import type { ConversationMessage } from './types.js';

export interface ConversationHistoryOptions {
  /** Messages kept per context; older ones are dropped first */
  maxMessagesPerContext?: number;
  /** Contexts kept; the least recently touched is dropped first */
  maxContexts?: number;
}

const DEFAULT_MAX_MESSAGES = 50;
const DEFAULT_MAX_CONTEXTS = 500;

export class ConversationHistory {
  private readonly contexts = new Map<string, ConversationMessage[]>();
  private readonly maxMessages: number;
  private readonly maxContexts: number;

  constructor(options: ConversationHistoryOptions = {}) {
    this.maxMessages = options.maxMessagesPerContext ?? DEFAULT_MAX_MESSAGES;
    this.maxContexts = options.maxContexts ?? DEFAULT_MAX_CONTEXTS;
  }

  /**
   * Copy of the stored messages for a context.
   */
  get(contextId: string): ConversationMessage[] {
    return (this.contexts.get(contextId) ?? []).map((message) => ({ ...message }));
  }

  /**
   * Replace the whole history of a context.
   */
  replace(contextId: string, messages: readonly ConversationMessage[]): void {
    this.store(contextId, messages.map((message) => ({ ...message })));
  }

  append(contextId: string, message: ConversationMessage): void {
    this.store(contextId, [...(this.contexts.get(contextId) ?? []), { ...message }]);
  }

  get size(): number {
    return this.contexts.size;
  }

  private store(contextId: string, messages: ConversationMessage[]): void {
    // Re-inserting moves the context to the most recent position
    this.contexts.delete(contextId);
    this.contexts.set(contextId, messages.slice(-this.maxMessages));

    while (this.contexts.size > this.maxContexts) {
      const oldest = this.contexts.keys().next();
      if (oldest.done) {
        break;
      }
      this.contexts.delete(oldest.value);
    }
  }
}
