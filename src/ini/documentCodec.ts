import { MalformedDocumentError } from "../errors";
import type { DocumentModel, Entry, Section } from "./documentModel";

function isComment(trimmed: string): boolean {
  return trimmed.startsWith("#") || trimmed.startsWith(";");
}

function isTrivia(trimmed: string): boolean {
  return trimmed === "" || isComment(trimmed);
}

function isHeader(trimmed: string): boolean {
  return trimmed.startsWith("[") && trimmed.endsWith("]");
}

/**
 * Split the trivia run before a header: from the first comment onwards the
 * lines introduce the next section, blank lines before that trail the
 * previous one.
 */
function splitTrivia(pending: string[]): [trailing: string[], leading: string[]] {
  const at = pending.findIndex((line) => isComment(line.trim()));
  return at === -1 ? [pending, []] : [pending.slice(0, at), pending.slice(at)];
}

/**
 * Parse an AWS-style INI document into ordered sections.
 *
 * Parsing is permissive: unknown headers and duplicate keys are kept in
 * encountered order, and every source line is retained so that
 * `serializeDocument(parseDocument(x)) === x`.  The only rejected input is a
 * key/value line that appears before the first header.
 */
export function parseDocument(text: string, path?: string): DocumentModel {
  const doc: DocumentModel = { preamble: [], sections: [], trailingNewline: false };
  if (text === "") return doc;

  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    doc.trailingNewline = true;
    lines.pop();
  }

  let current: Section | undefined;
  let raw: string[] = [];
  // trivia seen since the last body line; assigned once the next line shows where it belongs
  let pending: string[] = [];

  for (const [index, line] of lines.entries()) {
    const trimmed = line.trim();

    if (isHeader(trimmed)) {
      let leading: string[] = [];
      if (current) {
        const [trailing, next] = splitTrivia(pending);
        raw.push(...trailing);
        leading = next;
      } else {
        doc.preamble.push(...pending);
      }
      pending = [];

      raw = [line];
      current = { header: trimmed.slice(1, -1).trim(), entries: [], raw };
      if (leading.length > 0) current.leading = leading;
      doc.sections.push(current);
      continue;
    }

    if (isTrivia(trimmed)) {
      pending.push(line);
      continue;
    }

    if (!current) {
      throw new MalformedDocumentError(
        "Key/value line outside of any section",
        index + 1,
        line,
        path
      );
    }

    raw.push(...pending, line);
    pending = [];

    // Indented lines are nested settings (`s3 =` sub-keys) and lines without
    // "=" are continuations; both live in raw only.
    if (/^\s/.test(line)) continue;
    const eq = trimmed.indexOf("=");
    if (eq === -1) continue;
    const entry: Entry = [trimmed.slice(0, eq).trim(), trimmed.slice(eq + 1).trim()];
    current.entries.push(entry);
  }

  if (current) raw.push(...pending);
  else doc.preamble.push(...pending);

  return doc;
}

export function renderSection(section: Pick<Section, "header" | "entries">): string[] {
  return [
    `[${section.header}]`,
    ...section.entries.map(([key, value]) => `${key} = ${value}`),
  ];
}

function endsWithBlank(lines: string[]): boolean {
  return lines.length > 0 && lines[lines.length - 1].trim() === "";
}

/**
 * Serialize a document back to text.  Sections that still carry their source
 * lines are emitted verbatim; the others are rendered as `key = value` lines
 * separated from their neighbours by exactly one blank line.
 */
export function serializeDocument(doc: DocumentModel): string {
  const out: string[] = [...doc.preamble];
  let previousRendered = false;

  for (const section of doc.sections) {
    if (previousRendered) out.push("");

    if (section.raw) {
      out.push(...(section.leading ?? []), ...section.raw);
      previousRendered = false;
      continue;
    }

    if (out.length > 0 && !endsWithBlank(out)) out.push("");
    out.push(...(section.leading ?? []), ...renderSection(section));
    previousRendered = true;
  }

  if (out.length === 0) return "";
  const text = out.join("\n");
  return doc.trailingNewline || previousRendered ? `${text}\n` : text;
}
