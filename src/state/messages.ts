import type { Message, Role } from "../types.js";

/**
 * Append-only conversation. Entries are frozen when appended and never
 * reordered, so readers can hold on to `toArray()` results safely.
 */
export class MessageLog implements Iterable<Message> {
  private readonly entries: Message[] = [];

  constructor(initial: Iterable<Message> = []) {
    for (const message of initial) {
      this.push(message);
    }
  }

  append(role: Role, content: string, metadata: Record<string, unknown> = {}): Message {
    return this.push({ role, content, metadata });
  }

  push(message: Message): Message {
    const entry = Object.freeze({
      role: message.role,
      content: message.content,
      metadata: Object.freeze({ ...message.metadata }),
    });
    this.entries.push(entry);
    return entry;
  }

  get length(): number {
    return this.entries.length;
  }

  last(role?: Role): Message | undefined {
    for (let index = this.entries.length - 1; index >= 0; index -= 1) {
      const entry = this.entries[index];
      if (entry && (role === undefined || entry.role === role)) {
        return entry;
      }
    }
    return undefined;
  }

  toArray(): Message[] {
    return [...this.entries];
  }

  [Symbol.iterator](): Iterator<Message> {
    return this.entries[Symbol.iterator]();
  }
}

export function formatTranscript(messages: Iterable<Message>): string {
  const lines: string[] = [];
  for (const message of messages) {
    lines.push(`${message.role}: ${message.content}`);
  }
  return lines.join("\n");
}
