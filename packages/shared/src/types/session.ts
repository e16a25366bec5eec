export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
}

/** Serialised form of a stateful dispatch session. */
export interface ConversationState {
  id: string;
  createdAt: string;
  updatedAt: string;
  typeTag: string;
  /** Raw token-budgeted memory buffer, markers included */
  memory: string;
  tokenRatio: number;
  turns: ConversationTurn[];
  /** Dynamic context entries of the conversation's type tag at save time */
  dynamicContext: string[];
}

export interface ConversationListEntry {
  id: string;
  createdAt: string;
  updatedAt: string;
  turnCount: number;
  preview: string;
}
