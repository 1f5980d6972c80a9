import axios, { type AxiosResponse } from "axios";
import { z } from "zod";
import { log } from "../logger.js";
import type { Embed, RenderedMessage, Transport } from "./transport.js";

// ---------- Limits ----------
const LIMITS = {
  CONTENT: 2000,
  TITLE: 256,
  DESC: 4096,
  FIELDS: 25,
  FIELD_NAME: 256,
  FIELD_VALUE: 1024,
  TOTAL_EMBEDS: 10,
};

const API = "https://discord.com/api/v10";

/** Resolves after `ms`; rejects as soon as `signal` aborts. */
function pause(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) return reject(new Error("send aborted"));
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("send aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

const clip = (s: string, max: number) =>
  s.length > max ? s.slice(0, max - 1) + "…" : s;

export function sanitizeEmbed(e: Embed): Embed {
  const out: Embed = { ...e };
  if (out.title) out.title = clip(out.title, LIMITS.TITLE);
  if (out.description) out.description = clip(out.description, LIMITS.DESC);
  if (out.fields) {
    out.fields = out.fields.slice(0, LIMITS.FIELDS).map((f) => ({
      name: clip(f.name || "", LIMITS.FIELD_NAME),
      value: clip(f.value || "", LIMITS.FIELD_VALUE),
      inline: f.inline,
    }));
  }
  return out;
}

export function toDiscordBody(msg: RenderedMessage) {
  return {
    content: msg.content ? msg.content.slice(0, LIMITS.CONTENT) : undefined,
    embeds: (msg.embeds ?? []).slice(0, LIMITS.TOTAL_EMBEDS).map(sanitizeEmbed),
  };
}

const RateLimitBody = z.object({ retry_after: z.number() });

const ChannelMessage = z.object({
  id: z.string(),
  content: z.string(),
  author: z.object({ id: z.string(), bot: z.boolean().optional() }),
});
export type ChannelMessage = z.infer<typeof ChannelMessage>;

/** Discord REST client (Bot token): posts alerts and reads the admin channel. */
export class DiscordClient implements Transport {
  private readonly headers: Record<string, string>;

  constructor(
    token: string,
    private readonly timeoutMs = 8000
  ) {
    this.headers = {
      Authorization: `Bot ${token}`,
      "Content-Type": "application/json",
    };
  }

  /**
   * One retry on 429, and only when Discord's `retry_after` still fits in this
   * call's `timeoutMs` budget and the caller has not aborted.
   */
  private async withRateLimitRetry(
    call: () => Promise<AxiosResponse<unknown>>,
    signal?: AbortSignal
  ): Promise<AxiosResponse<unknown>> {
    const deadline = Date.now() + this.timeoutMs;
    try {
      return await call();
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 429) {
        const body = RateLimitBody.safeParse(err.response.data);
        const retryAfter = (body.success ? body.data.retry_after : 1) * 1000;
        if (signal?.aborted || Date.now() + retryAfter >= deadline) throw err;
        await pause(retryAfter, signal);
        return await call();
      }
      throw err;
    }
  }

  async send(
    channelId: string,
    msg: RenderedMessage,
    signal?: AbortSignal
  ): Promise<boolean> {
    try {
      await this.withRateLimitRetry(
        () =>
          axios.post(`${API}/channels/${channelId}/messages`, toDiscordBody(msg), {
            headers: this.headers,
            timeout: this.timeoutMs,
            signal,
          }),
        signal
      );
      return true;
    } catch (err) {
      log.warn("[DISCORD] send failed", {
        channelId,
        status: axios.isAxiosError(err) ? err.response?.status : undefined,
        err: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  /** Messages newer than `after`, oldest first. */
  async fetchMessagesAfter(
    channelId: string,
    after: string | null,
    limit = 50
  ): Promise<ChannelMessage[]> {
    const res = await this.withRateLimitRetry(() =>
      axios.get(`${API}/channels/${channelId}/messages`, {
        headers: this.headers,
        timeout: this.timeoutMs,
        params: after ? { after, limit } : { limit },
      })
    );
    const rows = z.array(ChannelMessage).parse(res.data);
    return rows.sort((a, b) => compareSnowflakes(a.id, b.id));
  }
}

/** Discord ids are 64-bit snowflakes ordered by creation time. */
export function compareSnowflakes(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}
