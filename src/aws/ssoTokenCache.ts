import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { SsoTokenNotFoundError } from "../errors";
import type { SsoSessionConfig } from "../ini/desiredSections";

export interface ConnectedSsoSession {
  // Name of the sso-session from ~/.aws/config
  ssoSession: string;
  // Region where the SSO APIs should be called.
  ssoRegion: string;
  // SSO access token left by `aws sso login`.
  accessToken: string;
  // When the access token expires.
  expiresAt: Date;
}

const CachedTokenSchema = z.object({
  accessToken: z.string().min(1),
  // older CLI releases wrote "2024-01-15T14:30:22UTC"
  expiresAt: z
    .string()
    .transform((value) => new Date(value.replace(/UTC$/, "Z")))
    .refine((date) => !Number.isNaN(date.getTime()), "invalid expiresAt"),
  region: z.string().min(1),
  startUrl: z.string().optional(),
});

export function defaultSsoCacheDir(): string {
  return path.join(os.homedir(), ".aws", "sso", "cache");
}

/**
 * Find the newest unexpired token the AWS CLI cached for `session`.  A cache
 * entry matches on start URL when it records one, otherwise on region.
 * This only reads the cache; logging in is left to `aws sso login`.
 */
export function loadCachedSsoToken(
  session: SsoSessionConfig,
  cacheDir: string = defaultSsoCacheDir(),
  now: Date = new Date()
): ConnectedSsoSession {
  let names: string[] = [];
  if (fs.existsSync(cacheDir)) {
    names = fs.readdirSync(cacheDir).filter((name) => name.endsWith(".json"));
  }

  let best: ConnectedSsoSession | undefined;

  for (const name of names.sort()) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(path.join(cacheDir, name), "utf-8"));
    } catch {
      // Unreadable or half-written cache files are not ours to repair.
      continue;
    }

    const token = CachedTokenSchema.safeParse(parsed);
    if (!token.success) continue;

    const { accessToken, expiresAt, region, startUrl } = token.data;
    const matches = startUrl ? startUrl === session.startUrl : region === session.region;
    if (!matches || expiresAt.getTime() <= now.getTime()) continue;

    if (!best || expiresAt.getTime() > best.expiresAt.getTime()) {
      best = { ssoSession: session.name, ssoRegion: session.region, accessToken, expiresAt };
    }
  }

  if (!best) {
    throw new SsoTokenNotFoundError(session.name, cacheDir);
  }
  return best;
}
