import type { Logger } from "./logger.js";
import type { LookupStore, LookupTables } from "./lookups.js";
import { copyText } from "./dialog/copy.js";
import { transition } from "./dialog/machine.js";
import { createSession, type DialogEvent, type Effect, type Keyboard, type Session, type ShownListing } from "./dialog/types.js";
import { formatListingCard } from "./formatters/telegram.js";
import { buildListingsPayload } from "./listings/client.js";
import type { Listing, ListingsClient } from "./listings/types.js";
import type { KeyedLock } from "./lock.js";
import type { ConversationStore, SessionStore, UserProfile, UserRecord } from "./store/types.js";

// Shown listings kept on the session for viewing selection.
const MAX_SHOWN = 60;

export type OutboundMessage = {
  text: string;
  keyboard?: Keyboard;
  photos?: string[];
};

export interface Outbound {
  send(chatId: number, message: OutboundMessage): Promise<void>;
}

export type InboundMessage = {
  chatId: number;
  from: UserProfile;
  event: DialogEvent;
};

export type ConversationDeps = {
  store: ConversationStore;
  sessions: SessionStore;
  listings: ListingsClient;
  lookups: LookupStore;
  outbound: Outbound;
  locks: KeyedLock;
  logger: Logger;
  pageSize: number;
  now?: () => number;
};

function describeEvent(event: DialogEvent): string {
  switch (event.type) {
    case "start":
      return "/start";
    case "summary":
      return "/filters";
    case "contact":
      return `[contact] ${event.phone}`;
    case "text":
      return event.text;
  }
}

function isLastFloor(listing: Listing): boolean {
  return listing.floor !== undefined && listing.floor === listing.floorsTotal;
}

/** Runs dialog turns: one at a time per chat, effects executed in order. */
export class ConversationService {
  private readonly log: Logger;

  constructor(private readonly deps: ConversationDeps) {
    this.log = deps.logger.child({ component: "conversation" });
  }

  handle(message: InboundMessage): Promise<void> {
    return this.deps.locks.run(String(message.chatId), () => this.processTurn(message));
  }

  private now(): number {
    return this.deps.now?.() ?? Date.now();
  }

  private async processTurn(message: InboundMessage): Promise<void> {
    const { store, sessions, lookups } = this.deps;
    const user = await store.upsertUser(message.from);
    let session = await sessions.load(message.chatId);

    if (session && message.event.type === "start") {
      await store.finishDialog(session.dialogId);
      this.log.info({ chatId: message.chatId, dialogId: session.dialogId }, "[DIALOG] retired on restart");
      session = undefined;
    } else if (session && !(await store.isDialogActive(session.dialogId))) {
      session = undefined;
    }

    let event = message.event;
    if (!session) {
      session = await this.openSession(message.chatId, user);
      // A newcomer's first words are not a name answer; greet, ask first and keep the request.
      if (session.state === "collecting_name" && event.type === "text") {
        session = { ...session, deferredRequest: event.text };
        event = { type: "start" };
      }
    }

    await store.appendMessage(session.dialogId, "user", describeEvent(message.event));

    const tables = lookups.current();
    const result = transition(session, event, { tables, pageSize: this.deps.pageSize, now: this.now() });
    this.log.info(
      {
        chatId: message.chatId,
        dialogId: session.dialogId,
        from: session.state,
        to: result.session.state,
        effects: result.effects.map((effect) => effect.type)
      },
      "[DIALOG] transition"
    );

    let current = result.session;
    await sessions.save(current);
    for (const effect of result.effects) {
      current = await this.execute(current, effect, tables);
    }
    await sessions.save(current);
  }

  private async openSession(chatId: number, user: UserRecord): Promise<Session> {
    const { store } = this.deps;
    const dialog = await store.openDialog(user.id);
    const [criteria, maxIndex, requested] = await Promise.all([
      store.latestCriteria(dialog.id),
      store.maxDisplayIndex(dialog.id),
      store.viewingRequestListingIds(dialog.id)
    ]);
    this.log.info({ chatId, dialogId: dialog.id, userId: user.id }, "[DIALOG] session opened");
    return createSession({
      chatId,
      userId: user.id,
      dialogId: dialog.id,
      displayName: user.displayName,
      criteria,
      nextDisplayIndex: maxIndex + 1,
      requestedListingIds: requested,
      now: this.now()
    });
  }

  private async reply(session: Session, message: OutboundMessage): Promise<void> {
    await this.deps.outbound.send(session.chatId, message);
    await this.deps.store.appendMessage(session.dialogId, "agent", message.text);
  }

  private async execute(session: Session, effect: Effect, tables: LookupTables): Promise<Session> {
    const { store } = this.deps;
    switch (effect.type) {
      case "send":
        await this.reply(session, { text: effect.text, keyboard: effect.keyboard });
        return session;
      case "save_name":
        await store.setDisplayName(session.userId, effect.name);
        return session;
      case "save_criteria":
        await store.saveCriteria(session.dialogId, session.criteria, effect.completed);
        return session;
      case "save_contact":
        await store.saveContact(session.userId, session.dialogId, effect.phone);
        return session;
      case "record_viewing_request":
        for (const listingId of effect.listingIds) {
          const shown = session.shownListings.find((item) => item.listingId === listingId);
          await store.recordViewingRequest(session.dialogId, listingId, { ...shown, criteria: session.criteria });
        }
        this.log.info({ chatId: session.chatId, listingIds: effect.listingIds }, "[VIEWING] request recorded");
        return session;
      case "fetch_listings":
        return this.showListings(session, tables);
    }
  }

  private async showListings(session: Session, tables: LookupTables): Promise<Session> {
    const { store, listings, pageSize } = this.deps;
    const payload = buildListingsPayload(session.criteria, { limit: pageSize, offset: session.offset });
    const result = await listings.search(payload);
    await store.logApiRequest(session.dialogId, {
      payload,
      response: { total: result.total, count: result.items.length, error: result.error ?? null }
    });

    let items = result.items;
    let total = result.total;
    if (session.criteria.floor_only_last) {
      items = items.filter(isLastFloor);
      total = items.length;
    }

    if (items.length === 0) {
      await this.reply(session, { text: copyText(tables, session.offset > 0 ? "no_more" : "no_results") });
      return session;
    }

    let nextIndex = session.nextDisplayIndex;
    const shown: ShownListing[] = [];
    for (const listing of items) {
      const displayIndex = nextIndex++;
      await store.logView(session.dialogId, listing.id, displayIndex, listing.raw);
      shown.push({ displayIndex, listingId: listing.id, title: listing.title, address: listing.address });
      await this.reply(session, { text: formatListingCard(listing, displayIndex), photos: listing.photos });
    }

    const remaining = Math.max(0, total - session.offset - items.length);
    await this.reply(session, {
      text: remaining > 0 ? copyText(tables, "remaining_some", { count: remaining }) : copyText(tables, "remaining_none")
    });

    return {
      ...session,
      nextDisplayIndex: nextIndex,
      shownListings: [...session.shownListings, ...shown].slice(-MAX_SHOWN)
    };
  }
}
