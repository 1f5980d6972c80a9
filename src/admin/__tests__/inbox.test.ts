import { describe, it, expect, beforeEach } from "vitest";
import {
  PREMIUM,
  makeDraft,
  makeHarness,
} from "../../__tests__/helpers.js";
import type { RenderedMessage } from "../../notify/transport.js";
import {
  CommandInbox,
  INBOX_CURSOR,
  type CommandChannel,
  type InboundMessage,
} from "../inbox.js";

class FakeChannel implements CommandChannel {
  messages: InboundMessage[] = [];
  replies: RenderedMessage[] = [];

  post(id: string, text: string, authorId = "admin-1", isBot = false) {
    this.messages.push({ id, text, authorId, isBot });
  }

  async fetchAfter(cursor: string | null) {
    return this.messages.filter(
      (m) => cursor === null || BigInt(m.id) > BigInt(cursor)
    );
  }

  async reply(message: RenderedMessage) {
    this.replies.push(message);
    return true;
  }
}

describe("CommandInbox", () => {
  let h: ReturnType<typeof makeHarness>;
  let channel: FakeChannel;
  let inbox: CommandInbox;

  const newInbox = () =>
    new CommandInbox({
      channel,
      store: h.store,
      context: { machine: h.machine },
      adminUserIds: ["admin-1"],
      intervalMs: 1000,
    });

  beforeEach(() => {
    h = makeHarness();
    channel = new FakeChannel();
    inbox = newInbox();
  });

  it("starts after the newest message instead of replaying history", async () => {
    channel.post("100", "!stats");
    channel.post("101", "!help");

    expect(await inbox.pollOnce()).toBe(0);
    expect(channel.replies).toEqual([]);
    expect(h.store.getCursor(INBOX_CURSOR)).toBe("101");
  });

  it("answers new commands and advances the cursor", async () => {
    channel.post("100", "hello");
    await inbox.pollOnce();

    channel.post("101", "!pending");
    expect(await inbox.pollOnce()).toBe(1);
    expect(channel.replies).toEqual([{ content: "No pending signals." }]);
    expect(h.store.getCursor(INBOX_CURSOR)).toBe("101");

    expect(await inbox.pollOnce()).toBe(0);
    expect(channel.replies).toHaveLength(1);
  });

  it("approves through the channel", async () => {
    channel.post("100", "hello");
    await inbox.pollOnce();
    const { signal } = await h.machine.create(makeDraft());

    channel.post("101", `!approve ${signal.id}`);
    await inbox.pollOnce();

    expect(channel.replies[0].content).toBe(
      `✅ ${signal.id} approved (tier=both) • premium: sent • free: withheld (delay remaining, 24h)`
    );
    expect(h.transport.to(PREMIUM)).toHaveLength(1);
  });

  it("ignores bots, chatter and non-admins but still moves past them", async () => {
    channel.post("100", "hello");
    await inbox.pollOnce();
    const { signal } = await h.machine.create(makeDraft());

    channel.post("101", `!approve ${signal.id}`, "someone-else");
    channel.post("102", "!stats", "bot-1", true);
    channel.post("103", "nice one");
    expect(await inbox.pollOnce()).toBe(3);

    expect(channel.replies).toEqual([]);
    expect(h.store.getSignal(signal.id)?.approvalStatus).toBe("pending");
    expect(h.store.getCursor(INBOX_CURSOR)).toBe("103");
  });

  it("replies with usage errors", async () => {
    channel.post("100", "hello");
    await inbox.pollOnce();

    channel.post("101", "!approve");
    await inbox.pollOnce();
    expect(channel.replies).toEqual([
      { content: "⚠️ INVALID_COMMAND: Usage: !approve <id>" },
    ]);
  });

  it("resumes from the stored cursor after a restart", async () => {
    channel.post("100", "hello");
    await inbox.pollOnce();
    channel.post("101", "!help");
    await inbox.pollOnce();

    const restarted = newInbox();
    expect(await restarted.pollOnce()).toBe(0);
    expect(channel.replies).toHaveLength(1);
  });

  it("does not set a cursor while the channel is empty", async () => {
    expect(await inbox.pollOnce()).toBe(0);
    expect(h.store.getCursor(INBOX_CURSOR)).toBeNull();
  });
});
