export type EmbedField = { name: string; value: string; inline?: boolean };
export type Embed = {
  title?: string;
  description?: string;
  url?: string;
  color?: number;
  timestamp?: string; // ISO
  fields?: EmbedField[];
  footer?: { text: string };
  author?: { name: string; url?: string };
};

/** Output of the (stateless) template layer. */
export type RenderedMessage = {
  content?: string;
  embeds?: Embed[];
};

/**
 * Outbound delivery. Once `signal` aborts the caller has counted the send as
 * failed, so nothing may be posted after that.
 */
export interface Transport {
  send(
    destination: string,
    message: RenderedMessage,
    signal?: AbortSignal
  ): Promise<boolean>;
}

export type SendOutcome = { ok: true } | { ok: false; reason: string };

/**
 * Bounds a transport call; rejection and timeout both count as "not sent".
 * On timeout the call is aborted.
 */
export async function sendWithTimeout(
  transport: Transport,
  destination: string,
  message: RenderedMessage,
  ms: number
): Promise<SendOutcome> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<SendOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ ok: false, reason: `timed out after ${ms}ms` });
    }, ms);
  });
  const attempt = transport.send(destination, message, controller.signal).then(
    (sent): SendOutcome =>
      sent ? { ok: true } : { ok: false, reason: "transport reported failure" },
    (err: unknown): SendOutcome => ({
      ok: false,
      reason: err instanceof Error ? err.message : String(err),
    })
  );
  try {
    return await Promise.race([attempt, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
