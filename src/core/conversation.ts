import type { Message } from './types.js'

/** Append-only message history for a single query. */
export class Conversation {
  private readonly messages: Message[] = []

  constructor(initial: readonly Message[] = []) {
    this.messages.push(...initial)
  }

  append(message: Message): void {
    this.messages.push(message)
  }

  snapshot(): Message[] {
    return [...this.messages]
  }
}
