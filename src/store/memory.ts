import type { Criteria } from "../criteria.js";
import type { Session } from "../dialog/types.js";
import type {
  ApiRequestLog,
  ConversationStore,
  DialogRecord,
  MessageSender,
  SessionStore,
  UserProfile,
  UserRecord
} from "./types.js";

type StoredUser = UserRecord & UserProfile;
type Logged<T> = T & { dialogId: number; at: number };

/** Process-local store used when no DATABASE_URL is configured, and in tests. */
export class MemoryConversationStore implements ConversationStore {
  readonly users = new Map<number, StoredUser>();
  readonly dialogs = new Map<number, DialogRecord>();
  readonly messages: Array<Logged<{ sender: MessageSender; content: string }>> = [];
  readonly criteriaSnapshots: Array<Logged<{ criteria: Criteria; completed: boolean }>> = [];
  readonly apiRequests: Array<Logged<ApiRequestLog>> = [];
  readonly views: Array<Logged<{ listingId: number; displayIndex: number; payload: Record<string, unknown> }>> = [];
  readonly viewingRequests: Array<Logged<{ listingId: number; payload: Record<string, unknown> }>> = [];
  private nextId = 1;

  async upsertUser(profile: UserProfile): Promise<UserRecord> {
    const existing = [...this.users.values()].find((user) => user.telegramId === profile.telegramId);
    if (existing) {
      Object.assign(existing, profile);
      return this.toRecord(existing);
    }
    const user: StoredUser = { ...profile, id: this.nextId++, displayName: null, phone: null };
    this.users.set(user.id, user);
    return this.toRecord(user);
  }

  async setDisplayName(userId: number, name: string): Promise<void> {
    const user = this.users.get(userId);
    if (user) {
      user.displayName = name;
    }
  }

  async openDialog(userId: number): Promise<DialogRecord> {
    const active = [...this.dialogs.values()].find((dialog) => dialog.userId === userId && dialog.isActive);
    if (active) {
      return { ...active };
    }
    const dialog: DialogRecord = { id: this.nextId++, userId, isActive: true, contactShared: false };
    this.dialogs.set(dialog.id, dialog);
    return { ...dialog };
  }

  async isDialogActive(dialogId: number): Promise<boolean> {
    return this.dialogs.get(dialogId)?.isActive ?? false;
  }

  async finishDialog(dialogId: number): Promise<void> {
    const dialog = this.dialogs.get(dialogId);
    if (dialog) {
      dialog.isActive = false;
    }
  }

  async appendMessage(dialogId: number, sender: MessageSender, content: string): Promise<void> {
    this.messages.push({ dialogId, sender, content, at: Date.now() });
  }

  async saveCriteria(dialogId: number, criteria: Criteria, completed: boolean): Promise<void> {
    this.criteriaSnapshots.push({ dialogId, criteria: structuredClone(criteria), completed, at: Date.now() });
  }

  async latestCriteria(dialogId: number): Promise<Criteria | undefined> {
    const snapshot = this.criteriaSnapshots.filter((entry) => entry.dialogId === dialogId).at(-1);
    return snapshot ? structuredClone(snapshot.criteria) : undefined;
  }

  async logApiRequest(dialogId: number, log: ApiRequestLog): Promise<void> {
    this.apiRequests.push({ dialogId, ...log, at: Date.now() });
  }

  async logView(dialogId: number, listingId: number, displayIndex: number, payload: Record<string, unknown>): Promise<void> {
    this.views.push({ dialogId, listingId, displayIndex, payload, at: Date.now() });
  }

  async maxDisplayIndex(dialogId: number): Promise<number> {
    return this.views
      .filter((view) => view.dialogId === dialogId)
      .reduce((max, view) => Math.max(max, view.displayIndex), 0);
  }

  async saveContact(userId: number, dialogId: number, phone: string): Promise<void> {
    const user = this.users.get(userId);
    if (user) {
      user.phone = phone;
    }
    const dialog = this.dialogs.get(dialogId);
    if (dialog) {
      dialog.contactShared = true;
    }
  }

  async recordViewingRequest(dialogId: number, listingId: number, payload: Record<string, unknown>): Promise<void> {
    this.viewingRequests.push({ dialogId, listingId, payload, at: Date.now() });
  }

  async viewingRequestListingIds(dialogId: number): Promise<number[]> {
    return [
      ...new Set(this.viewingRequests.filter((request) => request.dialogId === dialogId).map((request) => request.listingId))
    ];
  }

  private toRecord(user: StoredUser): UserRecord {
    return { id: user.id, telegramId: user.telegramId, displayName: user.displayName, phone: user.phone };
  }
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<number, Session>();

  async load(chatId: number): Promise<Session | undefined> {
    const session = this.sessions.get(chatId);
    return session ? structuredClone(session) : undefined;
  }

  async save(session: Session): Promise<void> {
    this.sessions.set(session.chatId, structuredClone(session));
  }

  async list(): Promise<Session[]> {
    return [...this.sessions.values()].map((session) => structuredClone(session));
  }
}
