// Authentication logic

import type { IncomingMessage } from "node:http";
import { timingSafeEqual } from "node:crypto";

export type AuthOptions = {
  authToken?: string;
  trustLoopback: boolean;
};

const LOOPBACK = new Set(["127.0.0.1", "::1", "::ffff:127.0.0.1"]);

export function isLoopback(req: IncomingMessage): boolean {
  return LOOPBACK.has(req.socket?.remoteAddress ?? "");
}

export function checkAuth(req: IncomingMessage, options: AuthOptions): boolean {
  if (!options.authToken) return true;
  if (options.trustLoopback && isLoopback(req)) return true;

  const provided = providedToken(req);
  return provided !== undefined && tokensMatch(provided, options.authToken);
}

/** Bearer header first, then X-Auth-Token, then `?token=`. */
export function providedToken(req: IncomingMessage): string | undefined {
  const authHeader = req.headers["authorization"];
  if (authHeader && /^Bearer\s+/i.test(authHeader)) return authHeader.replace(/^Bearer\s+/i, "");

  const xToken = req.headers["x-auth-token"];
  if (typeof xToken === "string" && xToken) return xToken;

  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  return url.searchParams.get("token") ?? undefined;
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
