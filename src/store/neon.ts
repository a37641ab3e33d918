import { neon, type NeonQueryFunction } from "@neondatabase/serverless";
import { z } from "zod";

import { criteriaSchema, type Criteria } from "../criteria.js";
import { sessionSchema, type Session } from "../dialog/types.js";
import type {
  ApiRequestLog,
  ConversationStore,
  DialogRecord,
  MessageSender,
  SessionStore,
  UserProfile,
  UserRecord
} from "./types.js";

type Sql = NeonQueryFunction<false, false>;

// bigint columns come back as strings.
const id = z.coerce.number().int();

const userRow = z.object({
  id,
  telegram_id: id,
  display_name: z.string().nullable(),
  phone: z.string().nullable()
});

const dialogRow = z.object({
  id,
  user_id: id,
  is_active: z.boolean(),
  contact_shared: z.boolean()
});

const criteriaRow = z.object({ criteria: criteriaSchema });
const maxRow = z.object({ max_index: z.coerce.number().int().nullable() });
const listingRow = z.object({ listing_id: id });
const sessionRow = z.object({ data: sessionSchema });

function toUser(row: z.infer<typeof userRow>): UserRecord {
  return { id: row.id, telegramId: row.telegram_id, displayName: row.display_name, phone: row.phone };
}

function toDialog(row: z.infer<typeof dialogRow>): DialogRecord {
  return { id: row.id, userId: row.user_id, isActive: row.is_active, contactShared: row.contact_shared };
}

export function createSql(connectionString: string): Sql {
  return neon(connectionString);
}

/** Postgres-backed conversation records; schema in sql/schema.sql. */
export class NeonConversationStore implements ConversationStore {
  constructor(private readonly sql: Sql) {}

  async upsertUser(profile: UserProfile): Promise<UserRecord> {
    const rows = await this.sql`
      insert into users (telegram_id, username, first_name, last_name)
      values (${profile.telegramId}, ${profile.username ?? null}, ${profile.firstName ?? null}, ${profile.lastName ?? null})
      on conflict (telegram_id) do update set
        username = excluded.username,
        first_name = excluded.first_name,
        last_name = excluded.last_name
      returning id, telegram_id, display_name, phone
    `;
    return toUser(userRow.parse(rows[0]));
  }

  async setDisplayName(userId: number, name: string): Promise<void> {
    await this.sql`update users set display_name = ${name} where id = ${userId}`;
  }

  async openDialog(userId: number): Promise<DialogRecord> {
    const active = await this.sql`
      select id, user_id, is_active, contact_shared
      from dialogs
      where user_id = ${userId} and is_active
      order by id desc
      limit 1
    `;
    if (active.length > 0) {
      return toDialog(dialogRow.parse(active[0]));
    }
    const created = await this.sql`
      insert into dialogs (user_id) values (${userId})
      returning id, user_id, is_active, contact_shared
    `;
    return toDialog(dialogRow.parse(created[0]));
  }

  async isDialogActive(dialogId: number): Promise<boolean> {
    const rows = await this.sql`select is_active from dialogs where id = ${dialogId}`;
    return rows.length > 0 && z.object({ is_active: z.boolean() }).parse(rows[0]).is_active;
  }

  async finishDialog(dialogId: number): Promise<void> {
    await this.sql`update dialogs set is_active = false, finished_at = now() where id = ${dialogId}`;
  }

  async appendMessage(dialogId: number, sender: MessageSender, content: string): Promise<void> {
    await this.sql`insert into messages (dialog_id, sender, content) values (${dialogId}, ${sender}, ${content})`;
  }

  async saveCriteria(dialogId: number, criteria: Criteria, completed: boolean): Promise<void> {
    await this.sql`
      insert into criteria_snapshots (dialog_id, criteria, completed)
      values (${dialogId}, ${JSON.stringify(criteria)}::jsonb, ${completed})
    `;
  }

  async latestCriteria(dialogId: number): Promise<Criteria | undefined> {
    const rows = await this.sql`
      select criteria from criteria_snapshots
      where dialog_id = ${dialogId}
      order by id desc
      limit 1
    `;
    return rows.length > 0 ? criteriaRow.parse(rows[0]).criteria : undefined;
  }

  async logApiRequest(dialogId: number, log: ApiRequestLog): Promise<void> {
    await this.sql`
      insert into api_requests (dialog_id, payload, response)
      values (${dialogId}, ${JSON.stringify(log.payload)}::jsonb, ${JSON.stringify(log.response)}::jsonb)
    `;
  }

  async logView(dialogId: number, listingId: number, displayIndex: number, payload: Record<string, unknown>): Promise<void> {
    await this.sql`
      insert into listing_views (dialog_id, listing_id, display_index, payload)
      values (${dialogId}, ${listingId}, ${displayIndex}, ${JSON.stringify(payload)}::jsonb)
    `;
  }

  async maxDisplayIndex(dialogId: number): Promise<number> {
    const rows = await this.sql`select max(display_index) as max_index from listing_views where dialog_id = ${dialogId}`;
    return maxRow.parse(rows[0]).max_index ?? 0;
  }

  async saveContact(userId: number, dialogId: number, phone: string): Promise<void> {
    await this.sql`update users set phone = ${phone} where id = ${userId}`;
    await this.sql`update dialogs set contact_shared = true where id = ${dialogId}`;
  }

  async recordViewingRequest(dialogId: number, listingId: number, payload: Record<string, unknown>): Promise<void> {
    await this.sql`
      insert into viewing_requests (dialog_id, listing_id, payload)
      values (${dialogId}, ${listingId}, ${JSON.stringify(payload)}::jsonb)
    `;
  }

  async viewingRequestListingIds(dialogId: number): Promise<number[]> {
    const rows = await this.sql`
      select distinct listing_id from viewing_requests where dialog_id = ${dialogId}
    `;
    return rows.map((row) => listingRow.parse(row).listing_id);
  }
}

export class NeonSessionStore implements SessionStore {
  constructor(private readonly sql: Sql) {}

  async load(chatId: number): Promise<Session | undefined> {
    const rows = await this.sql`select data from sessions where chat_id = ${chatId}`;
    return rows.length > 0 ? sessionRow.parse(rows[0]).data : undefined;
  }

  async save(session: Session): Promise<void> {
    await this.sql`
      insert into sessions (chat_id, data, updated_at)
      values (${session.chatId}, ${JSON.stringify(session)}::jsonb, now())
      on conflict (chat_id) do update set data = excluded.data, updated_at = now()
    `;
  }

  async list(): Promise<Session[]> {
    const rows = await this.sql`select data from sessions`;
    return rows.map((row) => sessionRow.parse(row).data);
  }
}
