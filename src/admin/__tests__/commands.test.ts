import { describe, it, expect } from "vitest";
import {
  expectError,
  expectOk,
  makeDraft,
  makeHarness,
} from "../../__tests__/helpers.js";
import { NotFoundError, fail } from "../../errors.js";
import {
  HELP_TEXT,
  executeCommand,
  parseCommand,
  renderReply,
  type CommandOutput,
} from "../commands.js";

function parse(text: string) {
  const res = parseCommand(text);
  if (!res) throw new Error(`not a command: ${text}`);
  return res;
}

describe("parseCommand", () => {
  it("ignores chatter", () => {
    expect(parseCommand("looks good to me")).toBeNull();
    expect(parseCommand("")).toBeNull();
  });

  it("parses approve with and without a tier", () => {
    expect(expectOk(parse("!approve abc123"))).toEqual({
      kind: "approve",
      id: "abc123",
    });
    expect(expectOk(parse("  !APPROVE abc123 BOTH "))).toEqual({
      kind: "approve",
      id: "abc123",
      tier: "both",
    });
  });

  it("rejects unknown tiers and missing ids", () => {
    const tier = expectError(parse("!approve abc gold"));
    expect(tier.code).toBe("INVALID_COMMAND");
    expect(tier.message).toBe("Unknown tier 'gold' (use premium, free or both)");

    const usage = expectError(parse("!reject"));
    expect(usage.message).toBe("Usage: !reject <id>");
  });

  it("keeps the rest of a reject line as the reason", () => {
    expect(expectOk(parse("!reject abc too   vague"))).toEqual({
      kind: "reject",
      id: "abc",
      reason: "too vague",
    });
  });

  it("bounds the pending list", () => {
    expect(expectOk(parse("!pending"))).toEqual({ kind: "pending", limit: 10 });
    expect(expectOk(parse("!pending 3"))).toEqual({ kind: "pending", limit: 3 });
    expect(expectOk(parse("!pending 100"))).toEqual({ kind: "pending", limit: 25 });
    expect(expectError(parse("!pending zero")).message).toBe(
      "Usage: !pending [count]"
    );
  });

  it("points unknown commands at help", () => {
    const err = expectError(parse("!frobnicate x"));
    expect(err.message).toBe("Unknown command '!frobnicate'. Try !help");
  });
});

describe("executeCommand + renderReply", () => {
  it("approves and reports the delivery", async () => {
    const { machine } = makeHarness();
    const { signal } = await machine.create(makeDraft());

    const res = await executeCommand({ kind: "approve", id: signal.id }, { machine });

    expect(renderReply(res)).toEqual({
      content: `✅ ${signal.id} approved (tier=both) • premium: sent • free: withheld (delay remaining, 24h)`,
    });
  });

  it("applies an operator tier", async () => {
    const { machine } = makeHarness();
    const { signal } = await machine.create(makeDraft());

    const res = await executeCommand(
      { kind: "approve", id: signal.id, tier: "premium" },
      { machine }
    );

    expect(renderReply(res).content).toBe(
      `✅ ${signal.id} approved (tier=premium) • premium: sent`
    );
  });

  it("rejects with a reason", async () => {
    const { machine } = makeHarness();
    const { signal } = await machine.create(makeDraft());

    const res = await executeCommand(
      { kind: "reject", id: signal.id, reason: "duplicate story" },
      { machine }
    );

    expect(renderReply(res).content).toBe(`🛑 ${signal.id} rejected: duplicate story`);
  });

  it("renders errors with their code", async () => {
    const { machine } = makeHarness();
    const res = await executeCommand({ kind: "approve", id: "nope" }, { machine });
    expect(renderReply(res).content).toBe("⚠️ NOT_FOUND: No signal 'nope' found");
  });

  it("previews a signal", async () => {
    const { machine } = makeHarness();
    const { signal } = await machine.create(makeDraft());
    const reply = renderReply(
      await executeCommand({ kind: "preview", id: signal.id }, { machine })
    );
    expect(reply.content).toBe(
      `Preview ${signal.id} — status=pending • tier=both • sent_premium=false • sent_free=false`
    );
  });

  it("lists pending signals", async () => {
    const { machine } = makeHarness();
    expect(
      renderReply(await executeCommand({ kind: "pending", limit: 10 }, { machine }))
        .content
    ).toBe("No pending signals.");

    const { signal } = await machine.create(makeDraft());
    expect(
      renderReply(await executeCommand({ kind: "pending", limit: 10 }, { machine }))
        .content
    ).toBe(
      `**Pending (1)**\n\`${signal.id}\` innovation 90% tier=both — Startup unveils prototype`
    );
  });

  it("shows stats", async () => {
    const { machine } = makeHarness();
    const { signal } = await machine.create(makeDraft());
    await machine.approve(signal.id);

    expect(
      renderReply(await executeCommand({ kind: "stats" }, { machine })).content
    ).toBe(
      [
        "**Stats**",
        "pending 0 • approved 1 • auto 0 • rejected 0",
        "sent premium 1 • sent free 0",
        "free this week 0/3",
      ].join("\n")
    );
  });

  it("answers help", async () => {
    const { machine } = makeHarness();
    const res = await executeCommand({ kind: "help" }, { machine });
    expect(renderReply(res)).toEqual({ content: HELP_TEXT });
  });

  it("passes a parse failure straight to the reply", () => {
    const res = fail<CommandOutput>(new NotFoundError("x"));
    expect(renderReply(res).content).toBe("⚠️ NOT_FOUND: No signal 'x' found");
  });
});
