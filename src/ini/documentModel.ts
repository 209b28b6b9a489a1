export type Entry = [key: string, value: string];

/**
 * One `[header]` block of an AWS-style config file.
 *
 * `leading` holds the comment lines directly above the header (and any blank
 * lines between them); they belong to this section and stay with it when it
 * is re-rendered.  `raw` holds the exact source lines from the header to the
 * last line of the body, plus blank lines that trail it.  Sections built by
 * the reconciler have no `raw` and are rendered canonically on output.
 */
export interface Section {
  header: string;
  entries: Entry[];
  leading?: string[];
  raw?: string[];
}

export interface DocumentModel {
  /** Blank and comment lines before the first header. */
  preamble: string[];
  sections: Section[];
  trailingNewline: boolean;
}

/** Target state for one section; replaces any same-header section in full. */
export interface DesiredSection {
  header: string;
  entries: Entry[];
}

export function emptyDocument(): DocumentModel {
  return { preamble: [], sections: [], trailingNewline: false };
}

export function findSection(doc: DocumentModel, header: string): Section | undefined {
  return doc.sections.find((s) => s.header === header);
}

/** Value of the last occurrence of `key`, matching how the AWS CLI reads duplicates. */
export function getEntry(section: Section, key: string): string | undefined {
  let value: string | undefined;
  for (const [k, v] of section.entries) {
    if (k === key) value = v;
  }
  return value;
}

export function sectionHeaders(doc: DocumentModel): string[] {
  return doc.sections.map((s) => s.header);
}

export function sameEntries(a: readonly Entry[], b: readonly Entry[]): boolean {
  if (a.length !== b.length) return false;
  return a.every(([key, value], i) => b[i][0] === key && b[i][1] === value);
}
