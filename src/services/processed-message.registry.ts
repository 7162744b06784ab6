/**
 * Ids of messages already handled. Oldest ids are evicted once the capacity is reached.
 */
export class ProcessedMessageRegistry {
  private readonly ids = new Set<string>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Processed message capacity must be a positive integer, got ${capacity}`);
    }
  }

  public has(messageId: string): boolean {
    return this.ids.has(messageId);
  }

  public add(messageId: string): void {
    if (this.ids.has(messageId)) {
      return;
    }

    this.ids.add(messageId);

    if (this.ids.size > this.capacity) {
      const oldest = this.ids.values().next();
      if (!oldest.done) {
        this.ids.delete(oldest.value);
      }
    }
  }

  public get size(): number {
    return this.ids.size;
  }
}
