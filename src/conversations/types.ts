export interface ConversationMessage {
  role: string;
  content: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export interface Conversation {
  id: string;
  messages: ConversationMessage[];
  metadata: Record<string, string>;
  createdAt: number;
  updatedAt: number;
}
