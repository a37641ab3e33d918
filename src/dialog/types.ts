import { z } from "zod";

import { criteriaSchema, slotKeySchema, type Criteria } from "../criteria.js";
import type { LookupTables } from "../lookups.js";

export const DIALOG_STATES = [
  "collecting_name",
  "browsing",
  "collecting_filters",
  "viewing_selection",
  "viewing_request"
] as const;

export type DialogState = (typeof DIALOG_STATES)[number];

export const shownListingSchema = z.object({
  displayIndex: z.number().int().positive(),
  listingId: z.number().int(),
  title: z.string(),
  address: z.string()
});

export type ShownListing = z.infer<typeof shownListingSchema>;

export const sessionSchema = z.object({
  chatId: z.number(),
  userId: z.number(),
  dialogId: z.number(),
  state: z.enum(DIALOG_STATES),
  displayName: z.string().nullable(),
  /** A newcomer's first message, replayed once the name is known. */
  deferredRequest: z.string().nullable().default(null),
  criteria: criteriaSchema,
  offset: z.number().int().min(0),
  pendingSlot: slotKeySchema.nullable(),
  currentQuestion: slotKeySchema.nullable(),
  askedQuestions: z.array(slotKeySchema),
  skippedSlots: z.array(slotKeySchema),
  shownListings: z.array(shownListingSchema),
  nextDisplayIndex: z.number().int().positive(),
  selectedListingIds: z.array(z.number().int()),
  requestedListingIds: z.array(z.number().int()),
  lastActivity: z.number(),
  silenceNotified: z.boolean()
});

export type Session = z.infer<typeof sessionSchema>;

export type NewSession = {
  chatId: number;
  userId: number;
  dialogId: number;
  displayName: string | null;
  criteria?: Criteria;
  nextDisplayIndex?: number;
  requestedListingIds?: number[];
  now: number;
};

export function createSession(init: NewSession): Session {
  return {
    chatId: init.chatId,
    userId: init.userId,
    dialogId: init.dialogId,
    state: init.displayName ? "browsing" : "collecting_name",
    displayName: init.displayName,
    deferredRequest: null,
    criteria: init.criteria ?? {},
    offset: 0,
    pendingSlot: null,
    currentQuestion: null,
    askedQuestions: [],
    skippedSlots: [],
    shownListings: [],
    nextDisplayIndex: init.nextDisplayIndex ?? 1,
    selectedListingIds: [],
    requestedListingIds: init.requestedListingIds ?? [],
    lastActivity: init.now,
    silenceNotified: false
  };
}

export type DialogEvent =
  | { type: "start" }
  | { type: "summary" }
  | { type: "text"; text: string }
  | { type: "contact"; phone: string };

export type Keyboard = "contact" | "remove";

export type Effect =
  | { type: "send"; text: string; keyboard?: Keyboard }
  | { type: "fetch_listings" }
  | { type: "save_name"; name: string }
  | { type: "save_criteria"; completed: boolean }
  | { type: "save_contact"; phone: string }
  | { type: "record_viewing_request"; listingIds: number[] };

export type TransitionContext = {
  tables: LookupTables;
  pageSize: number;
  now: number;
};

export type TransitionResult = {
  session: Session;
  effects: Effect[];
};
