import type { ChatMessage, ChatRole } from "@shared/schema";
import { SearchMemory } from "./searchMemory";

/**
 * Everything one chat session remembers: the transcript and the last
 * search. Both are reset together by `clear()`.
 */
export class ChatSession {
  readonly id: string;
  readonly memory = new SearchMemory();
  private messages: ChatMessage[] = [];

  constructor(id: string) {
    this.id = id;
  }

  addMessage(role: ChatRole, content: string): void {
    this.messages.push({ role, content });
  }

  get transcript(): readonly ChatMessage[] {
    return this.messages;
  }

  clear(): void {
    this.messages = [];
    this.memory.clear();
  }
}
