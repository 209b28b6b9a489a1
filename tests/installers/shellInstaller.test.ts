import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ShellInstaller } from "../../src/installers/shellInstaller";
import { AtomicWriter } from "../../src/files/atomicWriter";
import { BLOCK_END, BLOCK_START } from "../../src/shell/markedBlockEditor";
import { generateScript } from "../../src/shell/scriptTemplates";
import { UnsupportedShellError } from "../../src/errors";

function head(content: string | Buffer, length: number): string | Buffer {
  return typeof content === "string" ? content.slice(0, length) : content.subarray(0, length);
}

class FailingWriter extends AtomicWriter {
  async write(target: string, content: string | Buffer): Promise<void> {
    await super.write(target, head(content, 10));
    throw new Error("interrupted");
  }
}

describe("ShellInstaller", () => {
  let home: string;
  const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "ssosync-home-"));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  it("should install the sp block into the detected shell's startup file", async () => {
    const zshrc = path.join(home, ".zshrc");
    fs.writeFileSync(zshrc, "export EDITOR=vim\n");
    const installer = new ShellInstaller({ env: { SHELL: "/bin/zsh" }, homeDir: home, logger });

    const result = await installer.install();

    expect(result.shell).toBe("zsh");
    expect(result.configFile).toBe(zshrc);
    expect(result.changed).toBe(true);
    expect(fs.readFileSync(zshrc, "utf-8")).toBe(
      `export EDITOR=vim\n\n${BLOCK_START}\n${generateScript("zsh")}\n${BLOCK_END}\n`
    );
  });

  it("should not rewrite the file when the block is current", async () => {
    const installer = new ShellInstaller({ env: { SHELL: "/bin/bash" }, homeDir: home, logger });
    await installer.install();

    const second = await installer.install();

    expect(second.changed).toBe(false);
    expect(second.backup).toBeNull();
  });

  it("should refresh an outdated block and keep the surrounding content", async () => {
    const bashrc = path.join(home, ".bashrc");
    fs.writeFileSync(bashrc, `alias ll='ls -l'\n${BLOCK_START}\nsp() { :; }\n${BLOCK_END}\nexport PATH=$PATH:~/bin\n`);
    const installer = new ShellInstaller({ shell: "bash", homeDir: home, logger });

    const result = await installer.install();
    const text = fs.readFileSync(bashrc, "utf-8");

    expect(result.changed).toBe(true);
    expect(text.startsWith(`alias ll='ls -l'\n${BLOCK_START}\n`)).toBe(true);
    expect(text.endsWith(`${BLOCK_END}\nexport PATH=$PATH:~/bin\n`)).toBe(true);
    expect(text).not.toContain("sp() { :; }");
  });

  it("should create the fish config directory when needed", async () => {
    const installer = new ShellInstaller({ env: { SHELL: "/usr/bin/fish" }, homeDir: home, logger });

    const result = await installer.install();

    expect(result.configFile).toBe(path.join(home, ".config", "fish", "config.fish"));
    expect(fs.readFileSync(result.configFile, "utf-8")).toContain("set -gx AWS_PROFILE $argv[1]");
  });

  it("should remove the block on uninstall", async () => {
    const zshrc = path.join(home, ".zshrc");
    fs.writeFileSync(zshrc, "export EDITOR=vim\n");
    const installer = new ShellInstaller({ shell: "zsh", homeDir: home, logger });
    await installer.install();

    const result = await installer.uninstall();

    expect(result.changed).toBe(true);
    expect(fs.readFileSync(zshrc, "utf-8")).toBe("export EDITOR=vim\n\n");
  });

  it("should restore the startup file when the write is interrupted", async () => {
    const zshrc = path.join(home, ".zshrc");
    fs.writeFileSync(zshrc, "export EDITOR=vim\n");
    const installer = new ShellInstaller({ shell: "zsh", homeDir: home, writer: new FailingWriter(), logger });

    await expect(installer.install()).rejects.toMatchObject({ path: zshrc, rolledBack: true });
    expect(fs.readFileSync(zshrc, "utf-8")).toBe("export EDITOR=vim\n");
  });

  it("should keep bytes that are not valid UTF-8 around the block", async () => {
    const bashrc = path.join(home, ".bashrc");
    const latin1 = Buffer.from([0x23, 0x20, 0x63, 0x61, 0x66, 0xe9, 0x0a]);
    fs.writeFileSync(bashrc, latin1);
    const installer = new ShellInstaller({ shell: "bash", homeDir: home, logger });

    await installer.install();

    const block = Buffer.from(`\n${BLOCK_START}\n${generateScript("bash")}\n${BLOCK_END}\n`);
    expect(fs.readFileSync(bashrc)).toEqual(Buffer.concat([latin1, block]));

    await installer.uninstall();

    expect(fs.readFileSync(bashrc)).toEqual(Buffer.concat([latin1, Buffer.from("\n")]));
  });

  it("should reject an unsupported shell", async () => {
    const installer = new ShellInstaller({ env: { SHELL: "/bin/tcsh" }, homeDir: home, logger });

    await expect(installer.install()).rejects.toBeInstanceOf(UnsupportedShellError);
  });

  it("should report status with backups", async () => {
    const zshrc = path.join(home, ".zshrc");
    fs.writeFileSync(zshrc, "export EDITOR=vim\n");
    const installer = new ShellInstaller({ shell: "zsh", homeDir: home, logger });

    const before = await installer.status();
    await installer.install();
    const after = await installer.status();

    expect(before).toMatchObject({ shell: "zsh", configFile: zshrc, configFileExists: true, installed: false });
    expect(before.backups).toEqual([]);
    expect(after.installed).toBe(true);
    expect(after.backups).toHaveLength(1);
    expect(after.latestBackup?.originalPath).toBe(zshrc);
  });
});
