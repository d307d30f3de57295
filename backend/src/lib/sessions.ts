import { randomUUID } from "node:crypto";
import { ChatMessage, ChatSession } from "../types";

export interface SessionStore {
  getOrCreate(sessionId?: string): ChatSession;
  get(sessionId: string): ChatSession | undefined;
  append(sessionId: string, message: ChatMessage): void;
  delete(sessionId: string): boolean;
}

/** Process-local chat sessions; nothing survives a restart. */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ChatSession>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  getOrCreate(sessionId?: string): ChatSession {
    const id = sessionId ?? randomUUID();
    const existing = this.sessions.get(id);
    if (existing) {
      return existing;
    }
    const timestamp = this.now().toISOString();
    const session: ChatSession = { id, messages: [], created_at: timestamp, updated_at: timestamp };
    this.sessions.set(id, session);
    return session;
  }

  get(sessionId: string): ChatSession | undefined {
    return this.sessions.get(sessionId);
  }

  append(sessionId: string, message: ChatMessage): void {
    const session = this.getOrCreate(sessionId);
    session.messages.push(message);
    session.updated_at = this.now().toISOString();
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
