import fs from "fs";
import { SsoSessionNotFoundError } from "../errors";
import { parseDocument } from "../ini/documentCodec";
import { type DocumentModel, getEntry } from "../ini/documentModel";
import type { SsoSessionConfig } from "../ini/desiredSections";

export interface SsoProfile {
  name: string;
  defaultRegion?: string;
  ssoStartUrl: string;
  ssoRegion: string;
  ssoAccountId: string;
  ssoRoleName: string;
  ssoSession: string;
}

function loadDocument(configPath: string): DocumentModel {
  if (!fs.existsSync(configPath)) {
    return parseDocument("");
  }
  return parseDocument(fs.readFileSync(configPath, "utf-8"), configPath);
}

/**
 * SSO session definitions (`[sso-session NAME]`) that carry both a start URL
 * and a region.
 */
export function loadSsoSessions(configPath: string): SsoSessionConfig[] {
  const sessions: SsoSessionConfig[] = [];

  for (const section of loadDocument(configPath).sections) {
    if (!section.header.startsWith("sso-session ")) continue;

    const name = section.header.replace(/^sso-session\s+/, "");
    const startUrl = getEntry(section, "sso_start_url");
    const region = getEntry(section, "sso_region");
    if (!startUrl || !region) continue;

    sessions.push({
      name,
      startUrl,
      region,
      registrationScopes: getEntry(section, "sso_registration_scopes"),
    });
  }

  return sessions;
}

export function findSsoSession(configPath: string, name: string): SsoSessionConfig {
  const session = loadSsoSessions(configPath).find((s) => s.name === name);
  if (!session) {
    throw new SsoSessionNotFoundError(name, configPath);
  }
  return session;
}

/**
 * Load SSO-enabled profiles: profiles that reference a complete
 * `[sso-session]` through `sso_session` and name an account and role.
 */
export function loadSsoProfiles(configPath: string): SsoProfile[] {
  const sessions = new Map(loadSsoSessions(configPath).map((s) => [s.name, s]));
  const profiles: SsoProfile[] = [];

  for (const section of loadDocument(configPath).sections) {
    if (!section.header.startsWith("profile ")) continue;

    const ssoSessionName = getEntry(section, "sso_session");
    const session = ssoSessionName ? sessions.get(ssoSessionName) : undefined;
    const ssoAccountId = getEntry(section, "sso_account_id");
    const ssoRoleName = getEntry(section, "sso_role_name");

    if (!ssoSessionName || !session || !ssoAccountId || !ssoRoleName) {
      // Not an SSO-enabled profile we can use
      continue;
    }

    profiles.push({
      name: section.header.replace(/^profile\s+/, ""),
      defaultRegion: getEntry(section, "region"),
      ssoStartUrl: session.startUrl,
      ssoRegion: session.region,
      ssoAccountId,
      ssoRoleName,
      ssoSession: ssoSessionName,
    });
  }

  return profiles;
}

/** Every profile name the AWS CLI would accept for `--profile`, in file order. */
export function listProfileNames(configPath: string): string[] {
  const names: string[] = [];
  for (const section of loadDocument(configPath).sections) {
    let name: string | undefined;
    if (section.header === "default") name = "default";
    else if (section.header.startsWith("profile ")) {
      name = section.header.replace(/^profile\s+/, "");
    }
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}
