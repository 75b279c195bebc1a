import { AIMessage, HumanMessage, type BaseMessage } from '@langchain/core/messages';
import type { ConversationTurn } from '../assistant.types';

/**
 * In-process turn history of one session. Unbounded unless `maxTurns` is set,
 * in which case the oldest turns are evicted.
 */
export class ConversationMemory {
  private turns: ConversationTurn[] = [];

  constructor(private readonly maxTurns: number | null = null) {}

  add(question: string, answer: string, askedAt: Date = new Date()): void {
    this.turns.push({ question, answer, askedAt });

    if (this.maxTurns !== null && this.turns.length > this.maxTurns) {
      this.turns = this.turns.slice(this.turns.length - this.maxTurns);
    }
  }

  clear(): void {
    this.turns = [];
  }

  get length(): number {
    return this.turns.length;
  }

  getTurns(): ConversationTurn[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  toMessages(): BaseMessage[] {
    return this.turns.flatMap((turn) => [
      new HumanMessage(turn.question),
      new AIMessage(turn.answer),
    ]);
  }
}
