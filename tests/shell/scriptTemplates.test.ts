import { describe, it, expect } from "vitest";
import { generateScript } from "../../src/shell/scriptTemplates";
import { UnsupportedShellError } from "../../src/errors";

describe("scriptTemplates — generateScript", () => {
  it("should generate a POSIX sp function for bash and zsh", () => {
    const script = generateScript("bash");

    expect(script).toContain("sp() {");
    expect(script).toContain('    ssosync profiles list\n');
    expect(script).toContain('  if ssosync profiles check "$1" >/dev/null 2>&1; then\n');
    expect(script).toContain('    export AWS_PROFILE="$1"\n');
    expect(generateScript("zsh")).toBe(script);
  });

  it("should generate a fish function", () => {
    const script = generateScript("fish");

    expect(script).toContain("function sp\n");
    expect(script).toContain("    set -gx AWS_PROFILE $argv[1]\n");
    expect(script.endsWith("\nend")).toBe(true);
  });

  it("should call the given binary name", () => {
    expect(generateScript("zsh", "/opt/ssosync/bin/ssosync")).toContain(
      "    /opt/ssosync/bin/ssosync profiles list\n"
    );
  });

  it("should reject unsupported shells", () => {
    expect(() => generateScript("unsupported")).toThrow(UnsupportedShellError);
  });
});
