import type { Criteria } from "../criteria.js";
import type { Session } from "../dialog/types.js";

export type UserProfile = {
  telegramId: number;
  username?: string;
  firstName?: string;
  lastName?: string;
};

export type UserRecord = {
  id: number;
  telegramId: number;
  displayName: string | null;
  phone: string | null;
};

export type DialogRecord = {
  id: number;
  userId: number;
  isActive: boolean;
  contactShared: boolean;
};

export type MessageSender = "user" | "agent";

export type ApiRequestLog = {
  payload: Record<string, unknown>;
  response: { total: number; count: number; error: string | null };
};

/** Conversation records. Logs are append-only; criteria reads return the latest snapshot. */
export interface ConversationStore {
  upsertUser(profile: UserProfile): Promise<UserRecord>;
  setDisplayName(userId: number, name: string): Promise<void>;
  /** The user's active dialog, created when there is none. */
  openDialog(userId: number): Promise<DialogRecord>;
  isDialogActive(dialogId: number): Promise<boolean>;
  finishDialog(dialogId: number): Promise<void>;
  appendMessage(dialogId: number, sender: MessageSender, content: string): Promise<void>;
  saveCriteria(dialogId: number, criteria: Criteria, completed: boolean): Promise<void>;
  latestCriteria(dialogId: number): Promise<Criteria | undefined>;
  logApiRequest(dialogId: number, log: ApiRequestLog): Promise<void>;
  logView(dialogId: number, listingId: number, displayIndex: number, payload: Record<string, unknown>): Promise<void>;
  maxDisplayIndex(dialogId: number): Promise<number>;
  saveContact(userId: number, dialogId: number, phone: string): Promise<void>;
  recordViewingRequest(dialogId: number, listingId: number, payload: Record<string, unknown>): Promise<void>;
  viewingRequestListingIds(dialogId: number): Promise<number[]>;
}

export interface SessionStore {
  load(chatId: number): Promise<Session | undefined>;
  save(session: Session): Promise<void>;
  list(): Promise<Session[]>;
}
