import fs from "fs";
import os from "os";
import path from "path";
import { UnsupportedShellError } from "../errors";

export const SUPPORTED_SHELLS = ["bash", "zsh", "fish"] as const;
export type SupportedShell = (typeof SUPPORTED_SHELLS)[number];
export type ShellKind = SupportedShell | "unsupported";

export function isSupportedShell(name: string): name is SupportedShell {
  return SUPPORTED_SHELLS.some((shell) => shell === name);
}

/** Map a shell name or path (`/usr/local/bin/zsh`, `-bash`) to a ShellKind. */
export function parseShellKind(name: string): ShellKind {
  const base = path.basename(name.trim()).toLowerCase().replace(/^-/, "");
  return isSupportedShell(base) ? base : "unsupported";
}

/** Identify the invoking shell from `$SHELL`. */
export function detectShell(env: NodeJS.ProcessEnv = process.env): ShellKind {
  const shell = env.SHELL;
  if (!shell) return "unsupported";
  return parseShellKind(shell);
}

/** Startup files for a shell, in order of preference. */
export function shellConfigCandidates(kind: ShellKind, homeDir: string = os.homedir()): string[] {
  switch (kind) {
    case "bash":
      return [path.join(homeDir, ".bashrc"), path.join(homeDir, ".bash_profile")];
    case "zsh":
      return [path.join(homeDir, ".zshrc")];
    case "fish":
      return [path.join(homeDir, ".config", "fish", "config.fish")];
    default:
      return [];
  }
}

export interface ShellConfigFileOptions {
  homeDir?: string;
  exists?: (file: string) => boolean;
}

/**
 * The startup file to manage for `kind`: the first candidate that exists, or
 * the first candidate when none does yet (it will be created).
 */
export function shellConfigFile(kind: ShellKind, options: ShellConfigFileOptions = {}): string {
  const candidates = shellConfigCandidates(kind, options.homeDir ?? os.homedir());
  const [first] = candidates;
  if (kind === "unsupported" || first === undefined) {
    throw new UnsupportedShellError(kind, SUPPORTED_SHELLS);
  }
  const exists = options.exists ?? fs.existsSync;
  return candidates.find((candidate) => exists(candidate)) ?? first;
}
