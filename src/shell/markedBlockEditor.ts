import { MalformedDocumentError } from "../errors";

export const BLOCK_START = "# ssosync profile switcher - START";
export const BLOCK_END = "# ssosync profile switcher - END";

interface BlockBounds {
  start: number;
  end: number;
}

function findBlock(lines: string[]): BlockBounds | null {
  const start = lines.findIndex((line) => line.trim() === BLOCK_START);
  if (start === -1) return null;

  for (let i = start + 1; i < lines.length; i++) {
    if (lines[i].trim() === BLOCK_END) return { start, end: i };
  }
  throw new MalformedDocumentError("Managed block start marker without end marker", start + 1, lines[start]);
}

function bodyLines(body: string): string[] {
  const trimmed = body.endsWith("\n") ? body.slice(0, -1) : body;
  return trimmed === "" ? [] : trimmed.split("\n");
}

/**
 * Insert or refresh the managed block.  An existing block has everything
 * strictly between its markers replaced; content outside the markers is kept
 * as is.  Without a block, one is appended after a single blank line.
 */
export function upsertBlock(content: string, body: string): string {
  const lines = content.split("\n");
  const bounds = findBlock(lines);

  if (bounds) {
    return [
      ...lines.slice(0, bounds.start + 1),
      ...bodyLines(body),
      ...lines.slice(bounds.end),
    ].join("\n");
  }

  const block = [BLOCK_START, ...bodyLines(body), BLOCK_END].join("\n") + "\n";
  if (content === "") return block;

  let prefix = content.endsWith("\n") ? content : `${content}\n`;
  if (prefix !== "\n" && !prefix.endsWith("\n\n")) prefix += "\n";
  return prefix + block;
}

/** Delete the managed block, markers included.  Content without a block is returned unchanged. */
export function removeBlock(content: string): string {
  const lines = content.split("\n");
  const bounds = findBlock(lines);
  if (!bounds) return content;
  return [...lines.slice(0, bounds.start), ...lines.slice(bounds.end + 1)].join("\n");
}

/** The text between the markers, or null when there is no block. */
export function extractBlock(content: string): string | null {
  const lines = content.split("\n");
  const bounds = findBlock(lines);
  if (!bounds) return null;
  return lines.slice(bounds.start + 1, bounds.end).join("\n");
}

export function hasBlock(content: string): boolean {
  return extractBlock(content) !== null;
}
