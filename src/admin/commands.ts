import {
  InvalidCommandError,
  fail,
  ok,
  type OpResult,
} from "../errors.js";
import { renderPreview, renderText } from "../notify/templates.js";
import type { RenderedMessage } from "../notify/transport.js";
import type {
  ApprovalStateMachine,
  SignalStats,
} from "../pipeline/approval.js";
import type { DispatchReport } from "../pipeline/dispatch.js";
import type { OverrideTier, Signal } from "../types.js";

export type Command =
  | { kind: "approve"; id: string; tier?: OverrideTier }
  | { kind: "reject"; id: string; reason: string }
  | { kind: "preview"; id: string }
  | { kind: "pending"; limit: number }
  | { kind: "stats" }
  | { kind: "help" };

export type CommandOutput =
  | { kind: "approved"; signal: Signal; delivery?: DispatchReport }
  | { kind: "rejected"; signal: Signal }
  | { kind: "preview"; signal: Signal; message: RenderedMessage }
  | { kind: "pending"; signals: Signal[] }
  | { kind: "stats"; stats: SignalStats }
  | { kind: "help" };

const PENDING_DEFAULT = 10;
const PENDING_MAX = 25;

const OVERRIDE_TIERS: readonly OverrideTier[] = ["premium", "free", "both"];
const isOverrideTier = (x: string): x is OverrideTier =>
  OVERRIDE_TIERS.some((t) => t === x);

export const HELP_TEXT = [
  "**Commands**",
  "`!approve <id>` approve with the computed tier",
  "`!approve <id> premium|free|both` approve with an explicit tier",
  "`!reject <id> [reason]` reject",
  "`!preview <id>` show what each audience would receive",
  "`!pending [n]` list pending signals",
  "`!stats` counters and weekly free-tier usage",
].join("\n");

/** Null for chatter; a parse error for malformed `!` commands. */
export function parseCommand(text: string): OpResult<Command> | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("!")) return null;
  const [head, ...args] = trimmed.split(/\s+/);
  const name = head.slice(1).toLowerCase();
  const id = args[0];

  const needId = () =>
    fail<Command>(new InvalidCommandError(`Usage: !${name} <id>`));

  switch (name) {
    case "approve": {
      if (!id) return needId();
      const tier = args[1]?.toLowerCase();
      if (tier === undefined) return ok<Command>({ kind: "approve", id });
      if (!isOverrideTier(tier))
        return fail<Command>(
          new InvalidCommandError(
            `Unknown tier '${args[1]}' (use premium, free or both)`
          )
        );
      return ok<Command>({ kind: "approve", id, tier });
    }
    case "reject":
      if (!id) return needId();
      return ok<Command>({ kind: "reject", id, reason: args.slice(1).join(" ") });
    case "preview":
      if (!id) return needId();
      return ok<Command>({ kind: "preview", id });
    case "pending": {
      const n = id === undefined ? PENDING_DEFAULT : Number.parseInt(id, 10);
      if (!Number.isFinite(n) || n < 1)
        return fail<Command>(new InvalidCommandError("Usage: !pending [count]"));
      return ok<Command>({ kind: "pending", limit: Math.min(n, PENDING_MAX) });
    }
    case "stats":
      return ok<Command>({ kind: "stats" });
    case "help":
      return ok<Command>({ kind: "help" });
    default:
      return fail<Command>(
        new InvalidCommandError(`Unknown command '!${name}'. Try !help`)
      );
  }
}

export interface CommandContext {
  machine: ApprovalStateMachine;
}

/** Runs one command against the state machine; errors come back as results. */
export async function executeCommand(
  cmd: Command,
  { machine }: CommandContext
): Promise<OpResult<CommandOutput>> {
  switch (cmd.kind) {
    case "approve": {
      const res = cmd.tier
        ? await machine.approveOverride(cmd.id, cmd.tier)
        : await machine.approve(cmd.id);
      return res.ok
        ? ok<CommandOutput>({ kind: "approved", ...res.value })
        : fail<CommandOutput>(res.error);
    }
    case "reject": {
      const res = await machine.reject(cmd.id, cmd.reason);
      return res.ok
        ? ok<CommandOutput>({ kind: "rejected", signal: res.value.signal })
        : fail<CommandOutput>(res.error);
    }
    case "preview": {
      const res = machine.get(cmd.id);
      return res.ok
        ? ok<CommandOutput>({
            kind: "preview",
            signal: res.value,
            message: renderPreview(res.value),
          })
        : fail<CommandOutput>(res.error);
    }
    case "pending": {
      const res = machine.listPending(cmd.limit);
      return res.ok
        ? ok<CommandOutput>({ kind: "pending", signals: res.value })
        : fail<CommandOutput>(res.error);
    }
    case "stats": {
      const res = machine.stats();
      return res.ok
        ? ok<CommandOutput>({ kind: "stats", stats: res.value })
        : fail<CommandOutput>(res.error);
    }
    case "help":
      return ok<CommandOutput>({ kind: "help" });
  }
}

export function describeDelivery(d?: DispatchReport) {
  if (!d) return "";
  const parts: string[] = [];
  if (d.premium) parts.push(`premium: ${d.premium}`);
  if (d.free) {
    const decision = d.freeDecision;
    let free = `free: ${d.free}`;
    if (decision && !decision.send) {
      free +=
        decision.reason === "delay remaining"
          ? ` (delay remaining, ${decision.remainingHours}h)`
          : ` (${decision.reason})`;
    }
    parts.push(free);
  }
  return parts.join(" • ");
}

/** Turns a command result into the reply posted back to the operator. */
export function renderReply(res: OpResult<CommandOutput>): RenderedMessage {
  if (!res.ok) return renderText(`⚠️ ${res.error.code}: ${res.error.message}`);
  const out = res.value;
  switch (out.kind) {
    case "approved": {
      const delivery = describeDelivery(out.delivery);
      return renderText(
        `✅ ${out.signal.id} approved (tier=${out.signal.tierAssignment})` +
          (delivery ? ` • ${delivery}` : "")
      );
    }
    case "rejected":
      return renderText(
        `🛑 ${out.signal.id} rejected: ${out.signal.rejectReason ?? "unspecified"}`
      );
    case "preview":
      return out.message;
    case "pending":
      return renderText(
        out.signals.length
          ? [
              `**Pending (${out.signals.length})**`,
              ...out.signals.map(
                (s) =>
                  `\`${s.id}\` ${s.signalType} ${Math.round(
                    s.confidence * 100
                  )}% tier=${s.tierAssignment} — ${s.title.slice(0, 80)}`
              ),
            ].join("\n")
          : "No pending signals."
      );
    case "stats": {
      const { byStatus, sentFree, sentPremium, weeklyFreeSends, weeklyFreeCap } =
        out.stats;
      return renderText(
        [
          "**Stats**",
          `pending ${byStatus.pending} • approved ${byStatus.approved} • auto ${byStatus.auto_approved} • rejected ${byStatus.rejected}`,
          `sent premium ${sentPremium} • sent free ${sentFree}`,
          `free this week ${weeklyFreeSends}/${weeklyFreeCap}`,
        ].join("\n")
      );
    }
    case "help":
      return renderText(HELP_TEXT);
  }
}
