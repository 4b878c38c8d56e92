// ============================================================================
// CONVERSATION STORE - DOMAIN LAYER
// ============================================================================

import { v4 as uuidv4 } from 'uuid';
import {
  ConversationView,
  IConversationStore,
  ValidationDomainError
} from '../../core/interfaces';
import { Message, MessageRole } from '../../types';

export function createMessage(role: MessageRole, content: string, timestamp: Date = new Date()): Message {
  return Object.freeze({
    id: uuidv4(),
    role,
    content,
    timestamp
  });
}

class ConversationHistory implements ConversationView {
  private readonly log: Message[] = [];

  constructor(readonly advisor: string) {}

  get messages(): readonly Message[] {
    return this.log;
  }

  append(message: Message): void {
    this.log.push(message);
  }

  clear(): void {
    this.log.length = 0;
  }
}

/**
 * Session-scoped message logs, one per advisor name. Histories are created on
 * first access and only ever grow, unless reset.
 */
export class ConversationStore implements IConversationStore {
  private readonly histories = new Map<string, ConversationHistory>();

  get(advisor: string): ConversationView {
    return this.history(advisor);
  }

  /**
   * Frozen copy of an advisor's messages, safe to hand to callers.
   */
  view(advisor: string): ConversationView {
    const history = this.histories.get(advisor);
    return Object.freeze({
      advisor,
      messages: Object.freeze(history ? [...history.messages] : [])
    });
  }

  append(advisor: string, message: Message): void {
    this.assertMessage(advisor, message);
    this.history(advisor).append(Object.isFrozen(message) ? message : Object.freeze({ ...message }));
  }

  reset(advisor: string): void {
    this.histories.get(advisor)?.clear();
  }

  resetAll(): void {
    for (const history of this.histories.values()) {
      history.clear();
    }
  }

  size(advisor: string): number {
    return this.histories.get(advisor)?.messages.length ?? 0;
  }

  advisors(): string[] {
    return Array.from(this.histories.keys());
  }

  private history(advisor: string): ConversationHistory {
    let history = this.histories.get(advisor);
    if (!history) {
      history = new ConversationHistory(advisor);
      this.histories.set(advisor, history);
    }
    return history;
  }

  private assertMessage(advisor: string, message: Message): void {
    if (message.role !== 'user' && message.role !== 'advisor') {
      throw new ValidationDomainError(`Invalid message role for ${advisor}`, { advisor, role: message.role });
    }
    if (typeof message.content !== 'string') {
      throw new ValidationDomainError(`Message content for ${advisor} must be text`, { advisor });
    }
    if (!(message.timestamp instanceof Date) || Number.isNaN(message.timestamp.getTime())) {
      throw new ValidationDomainError(`Message timestamp for ${advisor} is invalid`, { advisor });
    }
  }
}
