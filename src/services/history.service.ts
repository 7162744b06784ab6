import { ConversationTurn, TurnRole } from '../types';
import logger from '../utils/logger';

export const HISTORY_LIMIT = 24;

/**
 * In-memory conversation log per chat plus the last reply sent to it
 */
export class HistoryService {
  private readonly turns = new Map<string, ConversationTurn[]>();
  private readonly lastReplies = new Map<string, string>();

  constructor(private readonly limit: number = HISTORY_LIMIT) {}

  /**
   * Appends a turn and keeps only the most recent ones
   */
  public appendTurn(chatId: string, role: TurnRole, content: string): void {
    const history = this.turns.get(chatId) ?? [];
    history.push({ role, content });

    this.turns.set(chatId, history.length > this.limit ? history.slice(-this.limit) : history);
  }

  /**
   * Most recent `size` turns, oldest first
   */
  public window(chatId: string, size: number): ConversationTurn[] {
    const history = this.turns.get(chatId) ?? [];
    if (size <= 0) {
      return [];
    }
    return history.slice(-size).map(turn => ({ ...turn }));
  }

  public clear(chatId: string): void {
    const hadHistory = this.turns.delete(chatId);
    const hadReply = this.lastReplies.delete(chatId);

    logger.info('Chat history cleared', { chatId, hadHistory, hadReply });
  }

  /**
   * True when the candidate equals the previous reply to this chat
   */
  public isDuplicateReply(chatId: string, candidate: string): boolean {
    const last = this.lastReplies.get(chatId);
    return last !== undefined && last.trim() === candidate.trim();
  }

  public rememberReply(chatId: string, reply: string): void {
    this.lastReplies.set(chatId, reply);
  }

  public conversationCount(): number {
    return this.turns.size;
  }
}
