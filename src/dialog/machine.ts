import { applyUpdate, hasAnyCriteria, isEmptyUpdate, restrictToSlot, type Criteria, type SlotKey } from "../criteria.js";
import { escapeHtml } from "../formatters/telegram.js";
import { summarizeCriteria } from "../formatters/summary.js";
import { extractAll, extractFilters } from "../nlu/extract.js";
import { numericFallback } from "../nlu/fallback.js";
import { extractPhone, hasIntent, matchObjection } from "../nlu/intents.js";
import { extractName } from "../nlu/name.js";
import { unique } from "../nlu/normalize.js";
import { QuestionFlow } from "../questions.js";
import { copyText, type CopyKey } from "./copy.js";
import type { DialogEvent, Effect, Keyboard, Session, TransitionContext, TransitionResult } from "./types.js";
import { describeSelection, resolveSelection } from "./viewing.js";

// Leftover after the name shorter than this is not treated as a request.
const MIN_LEFTOVER = 3;

type Turn = {
  s: Session;
  out: Effect[];
  ctx: TransitionContext;
};

function send(turn: Turn, text: string, keyboard?: Keyboard): void {
  turn.out.push(keyboard ? { type: "send", text, keyboard } : { type: "send", text });
}

function say(turn: Turn, key: CopyKey, vars?: Record<string, string | number>, keyboard?: Keyboard): void {
  send(turn, copyText(turn.ctx.tables, key, vars), keyboard);
}

function questionFlow(turn: Turn): QuestionFlow {
  return new QuestionFlow(turn.ctx.tables.questions);
}

function saveCriteria(turn: Turn): void {
  turn.out.push({ type: "save_criteria", completed: questionFlow(turn).isComplete(turn.s.criteria) });
}

function clearSearch(s: Session): void {
  s.criteria = {};
  s.offset = 0;
  s.pendingSlot = null;
  s.currentQuestion = null;
  s.askedQuestions = [];
  s.skippedSlots = [];
  s.selectedListingIds = [];
}

function startNewSearch(turn: Turn, keyboard?: Keyboard): void {
  clearSearch(turn.s);
  turn.s.state = "browsing";
  saveCriteria(turn);
  say(turn, "new_search", undefined, keyboard);
}

function leaveCollecting(s: Session): void {
  s.state = "browsing";
  s.currentQuestion = null;
  s.askedQuestions = [];
}

function search(turn: Turn): void {
  turn.s.offset = 0;
  say(turn, "searching", { summary: summarizeCriteria(turn.s.criteria, turn.ctx.tables) });
  turn.out.push({ type: "fetch_listings" });
}

/** Asks the next open question, or searches once nothing is left to ask. */
function advance(turn: Turn): void {
  const { s } = turn;
  const next = questionFlow(turn).getNext(s.criteria, [...s.askedQuestions, ...s.skippedSlots]);
  if (next) {
    s.state = "collecting_filters";
    s.currentQuestion = next.key;
    s.askedQuestions = unique([...s.askedQuestions, next.key]);
    send(turn, next.text);
    return;
  }
  leaveCollecting(s);
  search(turn);
}

function mergeCriteria(turn: Turn, update: Criteria): void {
  turn.s.criteria = applyUpdate(turn.s.criteria, update);
  turn.s.offset = 0;
  saveCriteria(turn);
}

/** Scoped answer for one slot; an empty update means the slot was skipped. */
function applyAnswer(turn: Turn, slot: SlotKey, update: Criteria): void {
  if (isEmptyUpdate(update)) {
    turn.s.skippedSlots = unique([...turn.s.skippedSlots, slot]);
    turn.s.offset = 0;
    return;
  }
  mergeCriteria(turn, restrictToSlot(update, slot));
}

function onStart(turn: Turn): void {
  const { s } = turn;
  const greeting = copyText(turn.ctx.tables, "greeting");
  if (s.displayName) {
    s.state = "browsing";
    send(turn, `${greeting}\n${copyText(turn.ctx.tables, "welcome_back", { name: escapeHtml(s.displayName) })}`);
    return;
  }
  s.state = "collecting_name";
  send(turn, `${greeting}\n${copyText(turn.ctx.tables, "ask_name")}`);
}

function onName(turn: Turn, text: string): void {
  const { name, rest } = extractName(text);
  if (!name) {
    say(turn, "ask_name");
    return;
  }
  const deferred = turn.s.deferredRequest;
  turn.s.displayName = name;
  turn.s.deferredRequest = null;
  turn.s.state = "browsing";
  turn.out.push({ type: "save_name", name });

  const leftover = rest.replace(/[^\p{L}\p{N}]/gu, "");
  let request: string | undefined;
  if (leftover.length >= MIN_LEFTOVER) {
    request = rest;
  } else if (deferred && !isEmptyUpdate(extractAll(deferred, turn.ctx.tables))) {
    request = deferred;
  }
  if (!request) {
    say(turn, "name_saved", { name: escapeHtml(name) });
    return;
  }
  say(turn, "name_saved_short", { name: escapeHtml(name) });
  onBrowsing(turn, request);
}

function onBrowsing(turn: Turn, text: string): void {
  const { s, ctx } = turn;
  const { tables } = ctx;

  if (hasIntent(text, "viewing", tables)) {
    if (s.shownListings.length === 0) {
      say(turn, "viewing_nothing_shown");
      return;
    }
    s.state = "viewing_selection";
    say(turn, "viewing_prompt");
    return;
  }

  if (hasIntent(text, "new_search", tables)) {
    startNewSearch(turn);
    return;
  }

  if (hasIntent(text, "more", tables)) {
    if (!hasAnyCriteria(s.criteria)) {
      say(turn, "need_parameter");
      return;
    }
    s.offset += ctx.pageSize;
    turn.out.push({ type: "fetch_listings" });
    return;
  }

  if (s.pendingSlot) {
    const slot = s.pendingSlot;
    s.pendingSlot = null;
    const result = extractFilters(slot, text, tables);
    if (!result.matched) {
      say(turn, "clarify_pending");
      return;
    }
    applyAnswer(turn, slot, result.update);
    search(turn);
    return;
  }

  const objection = matchObjection(text, tables);
  if (objection) {
    send(turn, objection.response);
    if (objection.slot) {
      s.pendingSlot = objection.slot;
    }
    return;
  }

  let update = extractAll(text, tables);
  if (isEmptyUpdate(update)) {
    update = numericFallback(text, s.criteria);
  }
  if (isEmptyUpdate(update)) {
    say(turn, hasAnyCriteria(s.criteria) ? "not_understood" : "need_parameter");
    return;
  }

  mergeCriteria(turn, update);
  advance(turn);
}

function onCollecting(turn: Turn, text: string): void {
  const { s, ctx } = turn;
  const { tables } = ctx;

  if (hasIntent(text, "new_search", tables)) {
    startNewSearch(turn);
    return;
  }

  const slot = s.currentQuestion;
  if (!slot) {
    leaveCollecting(s);
    onBrowsing(turn, text);
    return;
  }

  if (hasIntent(text, "skip", tables)) {
    s.skippedSlots = unique([...s.skippedSlots, slot]);
    advance(turn);
    return;
  }

  if (hasIntent(text, "continue", tables)) {
    leaveCollecting(s);
    search(turn);
    return;
  }

  const scoped = extractFilters(slot, text, tables);
  if (scoped.matched) {
    applyAnswer(turn, slot, scoped.update);
    advance(turn);
    return;
  }

  const update = extractAll(text, tables);
  if (!isEmptyUpdate(update)) {
    mergeCriteria(turn, update);
    advance(turn);
    return;
  }

  const objection = matchObjection(text, tables);
  if (objection) {
    send(turn, objection.response);
    if (objection.slot) {
      s.currentQuestion = objection.slot;
      s.askedQuestions = unique([...s.askedQuestions, objection.slot]);
    }
    return;
  }

  const question = questionFlow(turn).questionFor(slot);
  if (question) {
    send(turn, question.text);
  } else {
    say(turn, "not_understood");
  }
}

function onViewingSelection(turn: Turn, text: string): void {
  const { s } = turn;
  if (hasIntent(text, "new_search", turn.ctx.tables)) {
    startNewSearch(turn);
    return;
  }

  const matches = resolveSelection(text, s.shownListings);
  if (matches.length === 0) {
    say(turn, "viewing_not_found");
    return;
  }

  const requested = new Set(s.requestedListingIds);
  const duplicates = matches.filter((item) => requested.has(item.listingId));
  const fresh = matches.filter((item) => !requested.has(item.listingId));

  if (fresh.length === 0) {
    s.state = "browsing";
    say(turn, "viewing_all_duplicates", { list: describeSelection(duplicates) });
    return;
  }
  if (duplicates.length > 0) {
    say(turn, "viewing_some_duplicates", { list: describeSelection(duplicates) });
  }

  s.selectedListingIds = fresh.map((item) => item.listingId);
  s.state = "viewing_request";
  say(turn, "contact_request", { list: describeSelection(fresh) }, "contact");
}

function completeViewing(turn: Turn, phone: string): void {
  const { s } = turn;
  const listingIds = [...s.selectedListingIds];
  turn.out.push({ type: "save_contact", phone });
  turn.out.push({ type: "record_viewing_request", listingIds });
  s.requestedListingIds = unique([...s.requestedListingIds, ...listingIds]);
  s.selectedListingIds = [];
  s.state = "browsing";
  say(turn, "contact_thanks", undefined, "remove");
}

function onViewingRequest(turn: Turn, text: string): void {
  const phone = extractPhone(text);
  if (phone && turn.s.selectedListingIds.length > 0) {
    completeViewing(turn, phone);
    return;
  }
  if (hasIntent(text, "new_search", turn.ctx.tables)) {
    startNewSearch(turn, "remove");
    return;
  }
  say(turn, "contact_retry", undefined, "contact");
}

function onContact(turn: Turn, phone: string): void {
  if (turn.s.state === "viewing_request" && turn.s.selectedListingIds.length > 0) {
    completeViewing(turn, phone);
    return;
  }
  turn.out.push({ type: "save_contact", phone });
  say(turn, "contact_saved", undefined, "remove");
}

function onText(turn: Turn, text: string): void {
  switch (turn.s.state) {
    case "collecting_name":
      onName(turn, text);
      return;
    case "browsing":
      onBrowsing(turn, text);
      return;
    case "collecting_filters":
      onCollecting(turn, text);
      return;
    case "viewing_selection":
      onViewingSelection(turn, text);
      return;
    case "viewing_request":
      onViewingRequest(turn, text);
      return;
  }
}

/**
 * One conversation turn. Pure: returns the next session and the effects
 * the caller has to run, in order.
 */
export function transition(session: Session, event: DialogEvent, ctx: TransitionContext): TransitionResult {
  const turn: Turn = {
    s: { ...structuredClone(session), lastActivity: ctx.now, silenceNotified: false },
    out: [],
    ctx
  };

  switch (event.type) {
    case "start":
      onStart(turn);
      break;
    case "summary":
      say(turn, "summary", { summary: summarizeCriteria(turn.s.criteria, ctx.tables) });
      break;
    case "contact":
      onContact(turn, event.phone);
      break;
    case "text":
      onText(turn, event.text.trim());
      break;
  }

  return { session: turn.s, effects: turn.out };
}
