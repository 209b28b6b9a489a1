import os from "os";
import path from "path";
import { z } from "zod";
import { defaultSsoCacheDir } from "./aws/ssoTokenCache";
import { DEFAULT_BACKUP_KEEP } from "./files/backupManager";
import { DEFAULT_LOCK_TIMEOUT_MS } from "./files/fileLock";
import { DEFAULT_PROFILE_OUTPUT } from "./ini/desiredSections";
import { defaultAwsConfigPath } from "./installers/configInstaller";

function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return value;
}

const PathSchema = z.string().min(1).transform(expandHome);

const SettingsSchema = z.object({
  AWS_CONFIG_FILE: PathSchema.optional(),
  SSOSYNC_SSO_CACHE_DIR: PathSchema.optional(),
  SSOSYNC_LOCK_TIMEOUT_MS: z.coerce.number().int().min(100).max(600_000).default(DEFAULT_LOCK_TIMEOUT_MS),
  SSOSYNC_BACKUP_KEEP: z.coerce.number().int().min(1).max(100).default(DEFAULT_BACKUP_KEEP),
  SSOSYNC_PROFILE_OUTPUT: z.string().min(1).default(DEFAULT_PROFILE_OUTPUT),
  SHELL: z.string().optional(),
});

export interface Settings {
  awsConfigFile: string;
  ssoCacheDir: string;
  lockTimeoutMs: number;
  backupKeep: number;
  profileOutput: string;
  shell?: string;
}

/**
 * Read settings from the environment (after dotenv has merged any `.env`
 * file).  Empty variables count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = SettingsSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const s = result.data;
  return {
    awsConfigFile: s.AWS_CONFIG_FILE ?? defaultAwsConfigPath(),
    ssoCacheDir: s.SSOSYNC_SSO_CACHE_DIR ?? defaultSsoCacheDir(),
    lockTimeoutMs: s.SSOSYNC_LOCK_TIMEOUT_MS,
    backupKeep: s.SSOSYNC_BACKUP_KEEP,
    profileOutput: s.SSOSYNC_PROFILE_OUTPUT,
    shell: s.SHELL,
  };
}
