import type { SignalStore } from "../db/store.js";
import { StoreUnavailableError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { DiscordClient } from "../notify/discord.js";
import type { RenderedMessage } from "../notify/transport.js";
import {
  executeCommand,
  parseCommand,
  renderReply,
  type CommandContext,
} from "./commands.js";

export type InboundMessage = {
  id: string;
  authorId: string;
  isBot: boolean;
  text: string;
};

/** Ordered inbound stream addressed by an opaque, monotonically growing cursor. */
export interface CommandChannel {
  /** Messages after `cursor`, oldest first; `null` means "from the start". */
  fetchAfter(cursor: string | null): Promise<InboundMessage[]>;
  reply(message: RenderedMessage): Promise<boolean>;
}

export class DiscordCommandChannel implements CommandChannel {
  constructor(
    private readonly client: DiscordClient,
    private readonly channelId: string
  ) {}

  async fetchAfter(cursor: string | null) {
    const rows = await this.client.fetchMessagesAfter(this.channelId, cursor);
    return rows.map((m) => ({
      id: m.id,
      authorId: m.author.id,
      isBot: m.author.bot === true,
      text: m.content,
    }));
  }

  reply(message: RenderedMessage) {
    return this.client.send(this.channelId, message);
  }
}

export const INBOX_CURSOR = "admin_inbox";

export interface InboxDeps {
  channel: CommandChannel;
  store: Pick<SignalStore, "getCursor" | "setCursor">;
  context: CommandContext;
  /** Empty = anyone who can post in the channel. */
  adminUserIds: readonly string[];
  intervalMs: number;
}

/** Second worker: consumes admin commands one at a time, advancing a stored cursor. */
export class CommandInbox {
  private timer: NodeJS.Timeout | undefined;
  private polling = false;

  constructor(private readonly deps: InboxDeps) {}

  private async handle(m: InboundMessage) {
    const { channel, context, adminUserIds } = this.deps;
    if (m.isBot) return;
    const parsed = parseCommand(m.text);
    if (!parsed) return;
    if (adminUserIds.length && !adminUserIds.includes(m.authorId)) {
      log.warn("[ADMIN] ignoring command from non-admin", { author: m.authorId });
      return;
    }

    const result = parsed.ok
      ? await executeCommand(parsed.value, context)
      : parsed;
    log.info("[ADMIN] command", {
      text: m.text.slice(0, 120),
      ok: result.ok,
      error: result.ok ? undefined : result.error.code,
    });
    const sent = await channel.reply(renderReply(result));
    if (!sent) log.warn("[ADMIN] reply not delivered", { messageId: m.id });
  }

  /** Processes everything after the stored cursor; returns messages consumed. */
  async pollOnce(): Promise<number> {
    const { channel, store } = this.deps;
    const cursor = store.getCursor(INBOX_CURSOR);
    const messages = await channel.fetchAfter(cursor);

    if (cursor === null) {
      // First start: begin after the newest message instead of replaying history
      const newest = messages.at(-1);
      if (newest) store.setCursor(INBOX_CURSOR, newest.id);
      return 0;
    }

    for (const m of messages) {
      try {
        await this.handle(m);
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        log.error("[ADMIN] command failed", {
          messageId: m.id,
          err: errorMessage(err),
        });
      }
      store.setCursor(INBOX_CURSOR, m.id);
    }
    return messages.length;
  }

  private async safePoll() {
    if (this.polling) return;
    this.polling = true;
    try {
      await this.pollOnce();
    } catch (err) {
      log.error("[ADMIN] poll failed", { err: errorMessage(err) });
    } finally {
      this.polling = false;
    }
  }

  start() {
    if (this.timer) return;
    log.info("[ADMIN] inbox started", { intervalMs: this.deps.intervalMs });
    void this.safePoll();
    this.timer = setInterval(() => void this.safePoll(), this.deps.intervalMs);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}
