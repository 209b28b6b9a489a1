import fs from "fs";
import os from "os";
import { type Backup, BackupManager } from "../files/backupManager";
import { extractBlock, removeBlock, upsertBlock } from "../shell/markedBlockEditor";
import { DEFAULT_BIN_NAME, generateScript } from "../shell/scriptTemplates";
import { type ShellKind, detectShell, shellConfigFile } from "../shell/shellDetector";
import { type TransactionDeps, runFileTransaction } from "./fileTransaction";

export interface ShellInstallerOptions extends TransactionDeps {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Skip detection and manage this shell's startup file. */
  shell?: ShellKind;
  binName?: string;
}

export interface ShellTarget {
  shell: ShellKind;
  configFile: string;
}

export interface ShellInstallResult extends ShellTarget {
  changed: boolean;
  backup: Backup | null;
}

export interface ShellInstallStatus extends ShellTarget {
  configFileExists: boolean;
  installed: boolean;
  backups: Backup[];
  latestBackup: Backup | null;
}

/**
 * Keeps the `sp` profile switcher in the user's shell startup file as a
 * single managed block.  The shell and file are re-detected on every call.
 */
export class ShellInstaller {
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir: string;
  private readonly shell?: ShellKind;
  private readonly binName: string;
  private readonly backups: BackupManager;
  private readonly deps: TransactionDeps;

  constructor(options: ShellInstallerOptions = {}) {
    const { env, homeDir, shell, binName, ...deps } = options;
    this.env = env ?? process.env;
    this.homeDir = homeDir ?? os.homedir();
    this.shell = shell;
    this.binName = binName ?? DEFAULT_BIN_NAME;
    this.backups = deps.backups ?? new BackupManager();
    this.deps = { ...deps, backups: this.backups };
  }

  target(): ShellTarget {
    const shell = this.shell ?? detectShell(this.env);
    return { shell, configFile: shellConfigFile(shell, { homeDir: this.homeDir }) };
  }

  async install(): Promise<ShellInstallResult> {
    const target = this.target();
    const body = generateScript(target.shell, this.binName);
    const result = await runFileTransaction(
      target.configFile,
      (current) => upsertBlock(current, body),
      this.deps
    );
    return { ...target, changed: result.changed, backup: result.backup };
  }

  async uninstall(): Promise<ShellInstallResult> {
    const target = this.target();
    const result = await runFileTransaction(target.configFile, removeBlock, this.deps);
    return { ...target, changed: result.changed, backup: result.backup };
  }

  async status(): Promise<ShellInstallStatus> {
    const target = this.target();
    const configFileExists = fs.existsSync(target.configFile);
    const content = configFileExists ? await fs.promises.readFile(target.configFile, "utf-8") : "";
    const backups = await this.backups.list(target.configFile);

    return {
      ...target,
      configFileExists,
      installed: extractBlock(content) !== null,
      backups,
      latestBackup: backups[0] ?? null,
    };
  }
}
