import { type DesiredSection, type Section, getEntry } from "./documentModel";

export const DEFAULT_REGISTRATION_SCOPES = "sso:account:access";
export const DEFAULT_PROFILE_OUTPUT = "text";

export interface SsoSessionConfig {
  name: string;
  startUrl: string;
  region: string;
  registrationScopes?: string;
}

/** One role reachable through an SSO session. */
export interface AccountRole {
  accountId: string;
  roleName: string;
  region: string;
}

const SESSION_PROFILE_HEADER = /^profile (\d+)-(\S+)$/;

export function ssoSessionHeader(name: string): string {
  return `sso-session ${name}`;
}

export function profileName(accountId: string, roleName: string): string {
  return `${accountId}-${roleName}`;
}

export function ssoSessionSection(session: SsoSessionConfig): DesiredSection {
  return {
    header: ssoSessionHeader(session.name),
    entries: [
      ["sso_start_url", session.startUrl],
      ["sso_region", session.region],
      ["sso_registration_scopes", session.registrationScopes ?? DEFAULT_REGISTRATION_SCOPES],
    ],
  };
}

export function profileSections(
  sessionName: string,
  roles: readonly AccountRole[],
  output: string = DEFAULT_PROFILE_OUTPUT
): DesiredSection[] {
  return roles.map((role) => ({
    header: `profile ${profileName(role.accountId, role.roleName)}`,
    entries: [
      ["sso_session", sessionName],
      ["sso_account_id", role.accountId],
      ["sso_role_name", role.roleName],
      ["region", role.region],
      ["output", output],
    ],
  }));
}

/**
 * Stale-deletion scope for one session's generated profiles: an
 * `<account>-<role>` profile that points at this session.  Profiles of other
 * sessions, hand-written profiles and sso-session sections never match.
 */
export function sessionProfileScope(sessionName: string): (section: Section) => boolean {
  return (section) =>
    SESSION_PROFILE_HEADER.test(section.header) &&
    getEntry(section, "sso_session") === sessionName;
}
