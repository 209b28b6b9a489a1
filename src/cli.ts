import os from "os";
import { Command } from "commander";
import { discoverAccountRoles, type DiscoveredRole } from "./aws/ssoDiscovery";
import { findSsoSession, listProfileNames, loadSsoSessions } from "./aws/ssoProfiles";
import { type ConnectedSsoSession, loadCachedSsoToken } from "./aws/ssoTokenCache";
import { SsoSyncError, formatError } from "./errors";
import type { AccountRole, SsoSessionConfig } from "./ini/desiredSections";
import { ConfigInstaller, type ConfigInstallResult } from "./installers/configInstaller";
import { type Logger, type TransactionDeps, restoreLatestBackup } from "./installers/fileTransaction";
import { ShellInstaller } from "./installers/shellInstaller";
import { BackupManager } from "./files/backupManager";
import { parseShellKind } from "./shell/shellDetector";
import type { Settings } from "./settings";

export interface CliContext {
  settings: Settings;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  out?: Logger;
  discover?: (session: ConnectedSsoSession) => Promise<DiscoveredRole[]>;
  now?: () => Date;
}

interface SessionSetOptions {
  startUrl: string;
  region: string;
  scopes?: string;
}

interface ProfilesSyncOptions {
  region?: string;
  output?: string;
}

interface ShellOptions {
  shell?: string;
}

function reportConfigResult(out: Logger, result: ConfigInstallResult): void {
  if (!result.changed) {
    out.log(`${result.path} is already up to date`);
    return;
  }
  for (const header of result.diff.added) out.log(`  + [${header}]`);
  for (const header of result.diff.updated) out.log(`  ~ [${header}]`);
  for (const header of result.diff.removed) out.log(`  - [${header}]`);
  out.log(`Updated ${result.path}`);
  if (result.backup) out.log(`Backup: ${result.backup.backupPath}`);
}

/**
 * Build the `ssosync` command tree.  Everything the commands touch comes in
 * through `ctx`, so a program instance never shares state with another.
 */
export function createProgram(ctx: CliContext): Command {
  const { settings } = ctx;
  const out = ctx.out ?? console;
  const env = ctx.env ?? process.env;
  const shellEnv = settings.shell ? { ...env, SHELL: settings.shell } : env;
  const homeDir = ctx.homeDir ?? os.homedir();
  const discover = ctx.discover ?? discoverAccountRoles;

  const backupManager = new BackupManager({ now: ctx.now });
  const deps: TransactionDeps = {
    lockTimeoutMs: settings.lockTimeoutMs,
    backupKeep: settings.backupKeep,
    backups: backupManager,
    logger: out,
  };
  const configInstaller = () => new ConfigInstaller({ ...deps, configPath: settings.awsConfigFile });
  const shellInstaller = (options: ShellOptions) =>
    new ShellInstaller({
      ...deps,
      env: shellEnv,
      homeDir,
      shell: options.shell ? parseShellKind(options.shell) : undefined,
    });

  const program = new Command();
  program
    .name("ssosync")
    .description("Sync AWS SSO sessions and role profiles into ~/.aws/config")
    .version("0.1.0");

  const session = program.command("session").description("Manage [sso-session] sections");

  session
    .command("set <name>")
    .description("Create or replace an sso-session section")
    .requiredOption("--start-url <url>", "SSO start URL")
    .requiredOption("--region <region>", "SSO region")
    .option("--scopes <scopes>", "registration scopes")
    .action(async (name: string, options: SessionSetOptions) => {
      const config: SsoSessionConfig = {
        name,
        startUrl: options.startUrl,
        region: options.region,
        registrationScopes: options.scopes,
      };
      reportConfigResult(out, await configInstaller().installSsoSession(config));
    });

  session
    .command("list")
    .description("List the sso-session sections of the config file")
    .action(() => {
      for (const s of loadSsoSessions(settings.awsConfigFile)) {
        out.log(`${s.name}\t${s.startUrl}\t${s.region}`);
      }
    });

  const profiles = program.command("profiles").description("Manage per-role profiles");

  profiles
    .command("sync [sessions...]")
    .description("Write one profile per account/role reachable through each SSO session")
    .option("--region <region>", "region written into the profiles (default: the session's SSO region)")
    .option("--output <format>", "output format written into the profiles")
    .action(async (names: string[], options: ProfilesSyncOptions) => {
      const sessions =
        names.length > 0
          ? names.map((name) => findSsoSession(settings.awsConfigFile, name))
          : loadSsoSessions(settings.awsConfigFile);
      if (sessions.length === 0) {
        throw new SsoSyncError(`No [sso-session] sections in ${settings.awsConfigFile}`, {
          suggestions: ["Run: ssosync session set <name> --start-url <url> --region <region>"],
        });
      }

      const failures: unknown[] = [];
      for (const s of sessions) {
        try {
          const token = loadCachedSsoToken(s, settings.ssoCacheDir);
          const discovered = await discover(token);
          const roles: AccountRole[] = discovered.map((d) => ({
            accountId: d.accountId,
            roleName: d.roleName,
            region: options.region ?? s.region,
          }));
          out.log(`Session ${s.name}: ${roles.length} role(s)`);
          const result = await configInstaller().syncSessionProfiles(
            s.name,
            roles,
            options.output ?? settings.profileOutput
          );
          reportConfigResult(out, result);
        } catch (err) {
          out.error(formatError(err));
          failures.push(err);
        }
      }

      if (failures.length > 0) {
        throw new SsoSyncError(`${failures.length} of ${sessions.length} session(s) failed to sync`);
      }
    });

  profiles
    .command("list")
    .description("List profile names")
    .action(() => {
      const current = env.AWS_PROFILE;
      for (const name of listProfileNames(settings.awsConfigFile)) {
        out.log(`${name === current ? "*" : " "} ${name}`);
      }
    });

  profiles
    .command("check <name>")
    .description("Exit non-zero unless the profile exists")
    .action((name: string) => {
      if (!listProfileNames(settings.awsConfigFile).includes(name)) {
        throw new SsoSyncError(`Unknown profile: ${name}`);
      }
      out.log(name);
    });

  const shell = program.command("shell").description("Manage the sp shell function");

  shell
    .command("install")
    .description("Add or refresh the sp function in the shell startup file")
    .option("--shell <shell>", "bash, zsh or fish (default: detected from $SHELL)")
    .action(async (options: ShellOptions) => {
      const result = await shellInstaller(options).install();
      if (!result.changed) {
        out.log(`sp is already installed in ${result.configFile}`);
        return;
      }
      out.log(`Installed sp for ${result.shell} in ${result.configFile}`);
      if (result.backup) out.log(`Backup: ${result.backup.backupPath}`);
      out.log(`Restart your shell or run: source ${result.configFile}`);
    });

  shell
    .command("uninstall")
    .description("Remove the sp function from the shell startup file")
    .option("--shell <shell>", "bash, zsh or fish (default: detected from $SHELL)")
    .action(async (options: ShellOptions) => {
      const result = await shellInstaller(options).uninstall();
      if (!result.changed) {
        out.log(`sp is not installed in ${result.configFile}`);
        return;
      }
      out.log(`Removed sp from ${result.configFile}`);
      if (result.backup) out.log(`Backup: ${result.backup.backupPath}`);
    });

  shell
    .command("status")
    .description("Show where sp is installed")
    .option("--shell <shell>", "bash, zsh or fish (default: detected from $SHELL)")
    .action(async (options: ShellOptions) => {
      const status = await shellInstaller(options).status();
      out.log(`Shell:       ${status.shell}`);
      out.log(`Config file: ${status.configFile}${status.configFileExists ? "" : " (missing)"}`);
      out.log(`Installed:   ${status.installed ? "yes" : "no"}`);
      out.log(`Backups:     ${status.backups.length}`);
      if (status.latestBackup) out.log(`Latest:      ${status.latestBackup.backupPath}`);
    });

  const backups = program.command("backups").description("Inspect and restore backups");
  const backupTarget = (options: ShellOptions & { shellFile?: boolean }) =>
    options.shellFile ? shellInstaller(options).target().configFile : settings.awsConfigFile;

  backups
    .command("list")
    .description("List backups of the AWS config file (or the shell startup file)")
    .option("--shell-file", "use the shell startup file")
    .option("--shell <shell>", "bash, zsh or fish (default: detected from $SHELL)")
    .action(async (options: ShellOptions & { shellFile?: boolean }) => {
      const file = backupTarget(options);
      const list = await backupManager.list(file);
      if (list.length === 0) out.log(`No backups of ${file}`);
      for (const b of list) out.log(`${b.timestamp.toISOString()}\t${b.backupPath}`);
    });

  backups
    .command("restore")
    .description("Restore the newest backup of the AWS config file (or the shell startup file)")
    .option("--shell-file", "use the shell startup file")
    .option("--shell <shell>", "bash, zsh or fish (default: detected from $SHELL)")
    .action(async (options: ShellOptions & { shellFile?: boolean }) => {
      const result = await restoreLatestBackup(backupTarget(options), deps);
      out.log(
        result.changed
          ? `Restored ${result.path} from ${result.restoredFrom.backupPath}`
          : `${result.path} already matches ${result.restoredFrom.backupPath}`
      );
    });

  return program;
}
