import {
  SSOClient,
  ListAccountsCommand,
  ListAccountRolesCommand,
  type AccountInfo,
  type RoleInfo,
} from "@aws-sdk/client-sso";
import type { ConnectedSsoSession } from "./ssoTokenCache";

export interface DiscoveredRole {
  accountId: string;
  accountName: string;
  roleName: string;
}

/**
 * Discover all accessible AWS accounts and roles using an active SSO
 * access token.  One entry per account+role combination, in the order the
 * service returns them.
 */
export async function discoverAccountRoles(
  session: ConnectedSsoSession
): Promise<DiscoveredRole[]> {
  const sso = new SSOClient({ region: session.ssoRegion });

  // 1. List all accounts accessible with the SSO token
  const accounts: AccountInfo[] = [];
  let nextToken: string | undefined;

  do {
    const res = await sso.send(
      new ListAccountsCommand({
        accessToken: session.accessToken,
        nextToken,
      })
    );
    accounts.push(...(res.accountList ?? []));
    nextToken = res.nextToken;
  } while (nextToken);

  // 2. For each account, list available roles
  const discovered: DiscoveredRole[] = [];

  for (const account of accounts) {
    if (!account.accountId) continue;

    const roles: RoleInfo[] = [];
    let roleNextToken: string | undefined;

    do {
      const res = await sso.send(
        new ListAccountRolesCommand({
          accessToken: session.accessToken,
          accountId: account.accountId,
          nextToken: roleNextToken,
        })
      );
      roles.push(...(res.roleList ?? []));
      roleNextToken = res.nextToken;
    } while (roleNextToken);

    for (const role of roles) {
      if (!role.roleName) continue;
      discovered.push({
        accountId: account.accountId,
        accountName: account.accountName || account.accountId,
        roleName: role.roleName,
      });
    }
  }

  return discovered;
}
