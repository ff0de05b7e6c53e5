// Web Push Notification: subscription management + send

import * as fs from "node:fs";
import * as path from "node:path";
import webpush from "web-push";
import { z } from "zod";
import type { NotificationPayload, ReplyNotifier } from "./chat-service.js";
import type { LogSink } from "./logger.js";
import { errorMessage } from "./errors.js";

export const PushSubscriptionSchema = z.object({
  endpoint: z.string().url(),
  keys: z.object({ p256dh: z.string().min(1), auth: z.string().min(1) }),
});

export type PushSubscription = z.infer<typeof PushSubscriptionSchema>;

const VapidKeysSchema = z.object({ publicKey: z.string(), privateKey: z.string() });
type VapidKeys = z.infer<typeof VapidKeysSchema>;

export type PushNotifierOptions = {
  storeDir: string;
  /** VAPID subject, a mailto: or https: URL. */
  subject: string;
  log?: LogSink;
};

export class PushNotifier implements ReplyNotifier {
  private readonly vapidPath: string;
  private readonly subsPath: string;
  private vapidKeys: VapidKeys | null = null;

  constructor(private readonly options: PushNotifierOptions) {
    this.vapidPath = path.join(options.storeDir, "vapid.json");
    this.subsPath = path.join(options.storeDir, "subscriptions.json");
  }

  getVapidPublicKey(): string {
    return this.keys().publicKey;
  }

  addSubscription(sub: PushSubscription): void {
    const subs = this.readSubscriptions();
    // Deduplicate by endpoint
    const existing = subs.findIndex((s) => s.endpoint === sub.endpoint);
    if (existing >= 0) subs[existing] = sub;
    else subs.push(sub);
    this.writeSubscriptions(subs);
  }

  removeSubscription(endpoint: string): boolean {
    const subs = this.readSubscriptions();
    const kept = subs.filter((s) => s.endpoint !== endpoint);
    if (kept.length === subs.length) return false;
    this.writeSubscriptions(kept);
    return true;
  }

  listSubscriptions(): PushSubscription[] {
    return this.readSubscriptions();
  }

  async notify(payload: NotificationPayload): Promise<void> {
    const subs = this.readSubscriptions();
    if (subs.length === 0) return;

    const keys = this.keys();
    webpush.setVapidDetails(this.options.subject, keys.publicKey, keys.privateKey);

    const data = JSON.stringify(payload);
    const expired: string[] = [];
    const log = this.options.log;

    await Promise.allSettled(
      subs.map(async (sub) => {
        try {
          await webpush.sendNotification(sub, data);
          log?.info(`webchat: push sent (${sub.endpoint.slice(-20)})`);
        } catch (err) {
          if (err instanceof webpush.WebPushError && (err.statusCode === 410 || err.statusCode === 404)) {
            // Subscription expired
            expired.push(sub.endpoint);
          } else {
            log?.error(`webchat: push failed: ${errorMessage(err)}`);
          }
        }
      }),
    );

    for (const endpoint of expired) {
      this.removeSubscription(endpoint);
      log?.info(`webchat: expired push subscription removed (${endpoint.slice(-20)})`);
    }
  }

  private keys(): VapidKeys {
    if (!this.vapidKeys) this.vapidKeys = this.loadOrCreateVapidKeys();
    return this.vapidKeys;
  }

  private loadOrCreateVapidKeys(): VapidKeys {
    this.ensureDir();
    if (fs.existsSync(this.vapidPath)) {
      const stored = VapidKeysSchema.safeParse(readJson(this.vapidPath));
      if (stored.success) return stored.data;
      this.options.log?.warn(`webchat: ${this.vapidPath} is unreadable, generating new VAPID keys`);
    }
    const generated = webpush.generateVAPIDKeys();
    const vapid: VapidKeys = { publicKey: generated.publicKey, privateKey: generated.privateKey };
    fs.writeFileSync(this.vapidPath, JSON.stringify(vapid, null, 2));
    return vapid;
  }

  private readSubscriptions(): PushSubscription[] {
    if (!fs.existsSync(this.subsPath)) return [];
    const parsed = z.array(PushSubscriptionSchema).safeParse(readJson(this.subsPath));
    if (!parsed.success) {
      this.options.log?.warn(`webchat: ignoring malformed ${this.subsPath}`);
      return [];
    }
    return parsed.data;
  }

  private writeSubscriptions(subs: PushSubscription[]): void {
    this.ensureDir();
    fs.writeFileSync(this.subsPath, JSON.stringify(subs, null, 2));
  }

  private ensureDir(): void {
    if (!fs.existsSync(this.options.storeDir)) fs.mkdirSync(this.options.storeDir, { recursive: true });
  }
}

function readJson(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, "utf8"));
  } catch {
    return undefined;
  }
}
