// src/run_realtime.ts
import { mkdirSync } from "fs";
import { dirname } from "path";
import { CommandInbox, DiscordCommandChannel } from "./admin/inbox.js";
import { loadEnv, policyFromEnv } from "./config.js";
import { SignalDB } from "./db/SignalDB.js";
import { CalendarRunner } from "./jobs/calendar.js";
import { RotatingContentProvider } from "./jobs/content.js";
import { log } from "./logger.js";
import { DiscordClient } from "./notify/discord.js";
import type { Transport } from "./notify/transport.js";
import { ApprovalStateMachine } from "./pipeline/approval.js";
import { Classifier } from "./pipeline/classify.js";
import { Deduplicator } from "./pipeline/dedupe.js";
import { DispatchCoordinator } from "./pipeline/dispatch.js";
import { TierPolicy } from "./pipeline/tierPolicy.js";
import { HttpFeedSource } from "./providers/index.js";
import { SchedulerLoop } from "./scheduler.js";

/* --------------- preconditions --------------- */
const cfg = loadEnv();
const policy = policyFromEnv(cfg);

if (!cfg.FEED_URLS.length) log.warn("[BOOT] FEED_URLS is empty; nothing to poll");
if (!cfg.DISCORD_BOT_TOKEN)
  log.warn("[BOOT] DISCORD_BOT_TOKEN missing; alerts will not be delivered");

log.info("[BOOT] using DB:", cfg.DB_PATH);
log.info("[BOOT] policy:", policy);

/* ---------------- state ---------------- */
if (cfg.DB_PATH !== ":memory:") mkdirSync(dirname(cfg.DB_PATH), { recursive: true });
const store = new SignalDB(cfg.DB_PATH);

const discord = cfg.DISCORD_BOT_TOKEN
  ? new DiscordClient(cfg.DISCORD_BOT_TOKEN, policy.transportTimeoutMs)
  : undefined;

const offline: Transport = {
  async send(destination) {
    log.warn("[BOOT] no transport configured", { destination });
    return false;
  },
};
const transport: Transport = discord ?? offline;

const destinations = {
  premium: cfg.DISCORD_PREMIUM_CHANNEL_ID,
  free: cfg.DISCORD_FREE_CHANNEL_ID,
};

/* ---------------- core ---------------- */
const tierPolicy = new TierPolicy(policy);
const dispatcher = new DispatchCoordinator({
  store,
  transport,
  tierPolicy,
  policy,
  destinations,
});
const machine = new ApprovalStateMachine({ store, tierPolicy, dispatcher, policy });

const scheduler = new SchedulerLoop({
  feeds: new HttpFeedSource(),
  feedUrls: cfg.FEED_URLS,
  classifier: new Classifier(policy),
  dedupe: new Deduplicator(store),
  machine,
  dispatcher,
  calendar: new CalendarRunner({
    store,
    transport,
    destinations,
    content: new RotatingContentProvider(),
    policy,
  }),
  policy,
  intervalMs: Math.max(5, cfg.POLL_FEEDS_SECONDS) * 1000,
});

const inbox =
  discord && cfg.DISCORD_ADMIN_CHANNEL_ID
    ? new CommandInbox({
        channel: new DiscordCommandChannel(discord, cfg.DISCORD_ADMIN_CHANNEL_ID),
        store,
        context: { machine },
        adminUserIds: cfg.ADMIN_USER_IDS,
        intervalMs: Math.max(2, cfg.ADMIN_POLL_SECONDS) * 1000,
      })
    : undefined;
if (!inbox) log.warn("[BOOT] admin channel not configured; manual review disabled");

/* ---------------- boot ---------------- */
function shutdown(signal: string) {
  log.info("[BOOT] shutting down", { signal });
  scheduler.stop();
  inbox?.stop();
  store.close();
  process.exit(0);
}
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

scheduler.start();
inbox?.start();
