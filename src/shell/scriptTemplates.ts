import { UnsupportedShellError } from "../errors";
import { type ShellKind, SUPPORTED_SHELLS } from "./shellDetector";

export const DEFAULT_BIN_NAME = "ssosync";

function posixScript(bin: string): string {
  return `# Switch AWS profiles: 'sp' lists them, 'sp <name>' activates one
sp() {
  if [ -z "$1" ]; then
    ${bin} profiles list
    return $?
  fi
  if ${bin} profiles check "$1" >/dev/null 2>&1; then
    export AWS_PROFILE="$1"
    echo "AWS_PROFILE=$1"
  else
    echo "Unknown AWS profile: $1" >&2
    return 1
  fi
}`;
}

function fishScript(bin: string): string {
  return `# Switch AWS profiles: 'sp' lists them, 'sp <name>' activates one
function sp
  if test (count $argv) -eq 0
    ${bin} profiles list
    return $status
  end
  if ${bin} profiles check $argv[1] >/dev/null 2>&1
    set -gx AWS_PROFILE $argv[1]
    echo "AWS_PROFILE=$argv[1]"
  else
    echo "Unknown AWS profile: $argv[1]" >&2
    return 1
  end
end`;
}

/** Body of the managed block for `kind`; bash and zsh share one definition. */
export function generateScript(kind: ShellKind, bin: string = DEFAULT_BIN_NAME): string {
  switch (kind) {
    case "bash":
    case "zsh":
      return posixScript(bin);
    case "fish":
      return fishScript(bin);
    default:
      throw new UnsupportedShellError(kind, SUPPORTED_SHELLS);
  }
}
