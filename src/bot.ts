import { Markup, type Telegraf, type Telegram } from "telegraf";
import type { Message, User } from "telegraf/types";

import type { ConversationService, Outbound, OutboundMessage } from "./conversation.js";
import { copyText } from "./dialog/copy.js";
import type { DialogEvent, Keyboard } from "./dialog/types.js";
import type { Logger } from "./logger.js";
import type { LookupStore } from "./lookups.js";
import type { UserProfile } from "./store/types.js";

export function profileFrom(user: User): UserProfile {
  return {
    telegramId: user.id,
    username: user.username,
    firstName: user.first_name,
    lastName: user.last_name
  };
}

/** Maps an incoming Telegram message onto a dialog event; unsupported kinds give undefined. */
export function eventFromMessage(msg: Message): DialogEvent | undefined {
  if ("contact" in msg) {
    return { type: "contact", phone: msg.contact.phone_number };
  }
  if (!("text" in msg)) {
    return undefined;
  }
  const text = msg.text.trim();
  const command = /^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i.exec(text)?.[1]?.toLowerCase();
  if (command === "start") {
    return { type: "start" };
  }
  if (command === "filters") {
    return { type: "summary" };
  }
  return text === "" ? undefined : { type: "text", text };
}

export function replyMarkupFor(keyboard: Keyboard | undefined, contactLabel: string) {
  if (keyboard === "contact") {
    return Markup.keyboard([Markup.button.contactRequest(contactLabel)]).resize().oneTime().reply_markup;
  }
  if (keyboard === "remove") {
    return Markup.removeKeyboard().reply_markup;
  }
  return undefined;
}

type PhotoMedia = { type: "photo"; media: string; caption?: string; parse_mode?: "HTML" };

/** Album with the card as the first photo's caption. */
export function mediaGroupFor(photos: readonly string[], caption: string): PhotoMedia[] {
  return photos.map((url, index): PhotoMedia =>
    index === 0 ? { type: "photo", media: url, caption, parse_mode: "HTML" } : { type: "photo", media: url }
  );
}

/** Sends dialog output through the Bot API; a card whose photos fail goes out as text. */
export class TelegramOutbound implements Outbound {
  constructor(
    private readonly telegram: Telegram,
    private readonly lookups: LookupStore,
    private readonly logger: Logger
  ) {}

  async send(chatId: number, message: OutboundMessage): Promise<void> {
    const photos = message.photos ?? [];
    if (photos.length > 0) {
      try {
        if (photos.length === 1) {
          await this.telegram.sendPhoto(chatId, photos[0], { caption: message.text, parse_mode: "HTML" });
        } else {
          await this.telegram.sendMediaGroup(chatId, mediaGroupFor(photos, message.text));
        }
        return;
      } catch (err) {
        this.logger.warn(
          { chatId, photos: photos.length, err_message: err instanceof Error ? err.message : String(err) },
          "[BOT] photo send failed, falling back to text"
        );
      }
    }

    const reply_markup = replyMarkupFor(message.keyboard, copyText(this.lookups.current(), "contact_button"));
    await this.telegram.sendMessage(chatId, message.text, {
      parse_mode: "HTML",
      link_preview_options: { is_disabled: true },
      ...(reply_markup ? { reply_markup } : {})
    });
  }
}

export type BotDeps = {
  service: ConversationService;
  lookups: LookupStore;
  logger: Logger;
};

export function registerHandlers(bot: Telegraf, deps: BotDeps): void {
  const { service, lookups, logger } = deps;

  bot.on("message", async (ctx) => {
    const event = eventFromMessage(ctx.message);
    if (!event) {
      logger.debug({ chatId: ctx.chat.id }, "[BOT] unsupported message skipped");
      return;
    }
    await service.handle({ chatId: ctx.chat.id, from: profileFrom(ctx.from), event });
  });

  bot.catch(async (err, ctx) => {
    logger.error(
      {
        err_message: err instanceof Error ? err.message : String(err),
        chatId: ctx.chat?.id,
        update_type: ctx.updateType
      },
      "[BOT] unhandled bot error"
    );
    if (ctx.chat) {
      await ctx.reply(copyText(lookups.current(), "error")).catch((replyErr: unknown) => {
        logger.warn({ err_message: replyErr instanceof Error ? replyErr.message : String(replyErr) }, "[BOT] apology not sent");
      });
    }
  });
}
