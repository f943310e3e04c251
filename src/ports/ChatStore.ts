export type MessageRole = 'user' | 'assistant';

export interface ChatSession {
  id: number;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatSessionSummary extends ChatSession {
  messageCount: number;
}

export interface ChatMessage {
  id: number;
  sessionId: number;
  role: MessageRole;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export interface ChatSessionWithMessages extends ChatSession {
  messages: ChatMessage[];
}

export interface ChatStore {
  createSession(name: string): Promise<number>;
  /** Most recently updated first. */
  listSessions(): Promise<ChatSessionSummary[]>;
  getSession(id: number): Promise<ChatSessionWithMessages | null>;
  addMessage(sessionId: number, role: MessageRole, content: string, metadata?: Record<string, unknown>): Promise<number>;
  renameSession(id: number, name: string): Promise<boolean>;
  deleteSession(id: number): Promise<boolean>;
  migrate(): Promise<void>;
  close(): Promise<void>;
}
