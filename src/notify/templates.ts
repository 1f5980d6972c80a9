import { CATEGORY_LABEL } from "../pipeline/classify.js";
import { SIGNAL_TYPES, type Signal, type SignalType } from "../types.js";
import type { Embed, RenderedMessage } from "./transport.js";

/* ---------------- helpers ---------------- */
const clamp01 = (x: number) => Math.max(0, Math.min(1, x));

export function meter01(x: number, width = 14) {
  const v = clamp01(x);
  const filled = Math.round(v * width);
  return (
    "`" +
    "█".repeat(filled) +
    "░".repeat(width - filled) +
    "` " +
    Math.round(v * 100) +
    "%"
  );
}

export function bullets(arr?: readonly string[], max = 6) {
  if (!arr?.length) return "• _none_";
  return arr
    .slice(0, max)
    .map((s) => `• ${s}`)
    .join("\n");
}

const TYPE_EMOJI: Record<SignalType, string> = {
  acquisition: "🤝",
  ipo: "🔔",
  funding: "💰",
  innovation: "🧪",
  product_launch: "🚀",
  general: "📰",
};

const COLOR = {
  premium: 0xf1c40f, // gold
  free: 0x3498db, // blue
  digest: 0x738adb, // blurple
};

function headline(s: Signal) {
  return `${TYPE_EMOJI[s.signalType]} ${s.title || s.content.split("\n")[0]}`;
}

/* ---------------- alerts ---------------- */
export function renderPremium(s: Signal): RenderedMessage {
  const embed: Embed = {
    title: headline(s),
    url: s.link || undefined,
    description: `> ${s.prediction}`,
    color: COLOR.premium,
    timestamp: s.detectedAt,
    author: { name: "Premium signal — early access" },
    fields: [
      { name: "Category", value: CATEGORY_LABEL[s.signalType], inline: true },
      { name: "Confidence", value: meter01(s.confidence), inline: true },
      { name: "Source", value: s.source, inline: true },
      { name: "Evidence", value: bullets(s.evidence, 8), inline: false },
    ],
    footer: { text: `id=${s.id} • tier=${s.tierAssignment}` },
  };
  return { embeds: [embed] };
}

export function renderFree(s: Signal): RenderedMessage {
  const embed: Embed = {
    title: headline(s),
    url: s.link || undefined,
    description: s.prediction,
    color: COLOR.free,
    timestamp: s.detectedAt,
    fields: [
      { name: "Category", value: CATEGORY_LABEL[s.signalType], inline: true },
      {
        name: "Confidence",
        value: `${Math.round(s.confidence * 100)}%`,
        inline: true,
      },
    ],
    footer: { text: "Premium members received this signal first." },
  };
  return { embeds: [embed] };
}

/** Operator preview: what each audience would receive. */
export function renderPreview(s: Signal): RenderedMessage {
  const meta = [
    `status=${s.approvalStatus}`,
    `tier=${s.tierAssignment}`,
    `sent_premium=${s.sentPremium}`,
    `sent_free=${s.sentFree}`,
  ].join(" • ");
  return {
    content: `Preview ${s.id} — ${meta}`,
    embeds: [...(renderPremium(s).embeds ?? []), ...(renderFree(s).embeds ?? [])],
  };
}

/* ---------------- digests ---------------- */
export function renderDigest(
  title: string,
  signals: readonly Signal[],
  intro?: string,
  max = 10
): RenderedMessage {
  const lines = signals
    .slice(0, max)
    .map(
      (s) =>
        `${TYPE_EMOJI[s.signalType]} **${s.title || s.id}** — ${Math.round(
          s.confidence * 100
        )}%`
    );
  return {
    embeds: [
      {
        title,
        description: [intro, lines.length ? lines.join("\n") : "_No signals in this period._"]
          .filter(Boolean)
          .join("\n\n"),
        color: COLOR.digest,
      },
    ],
  };
}

export function renderCountsDigest(
  title: string,
  counts: Partial<Record<SignalType, number>>,
  intro?: string
): RenderedMessage {
  const fields = SIGNAL_TYPES.filter((t) => (counts[t] ?? 0) > 0)
    .map((t) => ({
      name: `${TYPE_EMOJI[t]} ${CATEGORY_LABEL[t]}`,
      value: String(counts[t]),
      inline: true,
    }));
  return {
    embeds: [
      {
        title,
        description: intro,
        color: COLOR.digest,
        fields: fields.length
          ? fields
          : [{ name: "Signals", value: "_none_", inline: false }],
      },
    ],
  };
}

export function renderText(text: string): RenderedMessage {
  return { content: text };
}
