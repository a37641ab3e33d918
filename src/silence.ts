import { copyText } from "./dialog/copy.js";
import type { Outbound } from "./conversation.js";
import type { Logger } from "./logger.js";
import type { KeyedLock } from "./lock.js";
import type { LookupStore } from "./lookups.js";
import type { ConversationStore, SessionStore } from "./store/types.js";

export type SilenceMonitorDeps = {
  sessions: SessionStore;
  store: ConversationStore;
  outbound: Outbound;
  lookups: LookupStore;
  locks: KeyedLock;
  logger: Logger;
  thresholdMs: number;
  intervalMs: number;
  now?: () => number;
};

/** Sends one nudge to each conversation that went quiet; a new message re-arms it. */
export class SilenceMonitor {
  private timer?: NodeJS.Timeout;
  private readonly log: Logger;

  constructor(private readonly deps: SilenceMonitorDeps) {
    this.log = deps.logger.child({ component: "silence" });
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        this.log.error({ err }, "[SILENCE] sweep failed");
      });
    }, this.deps.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private now(): number {
    return this.deps.now?.() ?? Date.now();
  }

  private isSilent(lastActivity: number, notified: boolean): boolean {
    return !notified && this.now() - lastActivity >= this.deps.thresholdMs;
  }

  /** One pass over all sessions; returns how many were nudged. */
  async sweep(): Promise<number> {
    const { sessions, locks } = this.deps;
    const candidates = (await sessions.list()).filter((s) => this.isSilent(s.lastActivity, s.silenceNotified));
    let notified = 0;

    for (const candidate of candidates) {
      const sent = await locks.run(String(candidate.chatId), async () => {
        // Re-read under the lock: a turn may have landed since the listing.
        const session = await sessions.load(candidate.chatId);
        if (!session || !this.isSilent(session.lastActivity, session.silenceNotified)) {
          return false;
        }
        const text = copyText(this.deps.lookups.current(), "silence");
        await this.deps.outbound.send(session.chatId, { text });
        await this.deps.store.appendMessage(session.dialogId, "agent", text);
        await sessions.save({ ...session, silenceNotified: true });
        this.log.info({ chatId: session.chatId, silentMs: this.now() - session.lastActivity }, "[SILENCE] nudge sent");
        return true;
      });
      if (sent) {
        notified += 1;
      }
    }
    return notified;
  }
}
