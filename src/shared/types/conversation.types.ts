export type ConversationRole = "user" | "agent";

export interface ConversationTurn {
  readonly role: ConversationRole;
  readonly text: string;
  readonly position: number;
}
