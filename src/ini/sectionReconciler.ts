import { InvalidSectionError } from "../errors";
import {
  type DesiredSection,
  type DocumentModel,
  type Entry,
  type Section,
  sameEntries,
} from "./documentModel";

export interface ReconcileOptions {
  /**
   * Sections for which this returns true are owned by the caller: when they
   * are absent from the desired set they are deleted rather than kept.
   */
  staleScope?: (section: Section) => boolean;
}

export interface DocumentDiff {
  added: string[];
  updated: string[];
  removed: string[];
  unchanged: string[];
}

function hasLineBreak(value: string): boolean {
  return /[\r\n]/.test(value);
}

/** Validate a desired section and collapse duplicate keys (last value wins, first position kept). */
export function normalizeDesiredSection(desired: DesiredSection): DesiredSection {
  const header = desired.header.trim();
  if (!header) throw new InvalidSectionError(desired.header, "header is empty");
  if (hasLineBreak(header) || header.includes("]")) {
    throw new InvalidSectionError(header, "header must be a single line without ']'");
  }

  const entries: Entry[] = [];
  const positions = new Map<string, number>();
  for (const [rawKey, rawValue] of desired.entries) {
    const key = rawKey.trim();
    const value = rawValue.trim();
    if (!key || key.includes("=") || hasLineBreak(key)) {
      throw new InvalidSectionError(header, `invalid key '${rawKey}'`);
    }
    if (hasLineBreak(rawValue)) {
      throw new InvalidSectionError(header, `value of '${key}' spans several lines`);
    }
    const at = positions.get(key);
    if (at === undefined) {
      positions.set(key, entries.length);
      entries.push([key, value]);
    } else {
      entries[at] = [key, value];
    }
  }

  return { header, entries };
}

/**
 * Compute the document that results from ensuring every desired section is
 * present.  Pure: the input document is not modified.
 *
 * - a desired section replaces the first same-header section in place, and
 *   later duplicates of that header are dropped;
 * - unmatched desired sections are appended in the order given;
 * - sections not mentioned are left untouched, unless `staleScope` claims
 *   them, in which case they are removed.
 */
export function reconcile(
  current: DocumentModel,
  desired: readonly DesiredSection[],
  options: ReconcileOptions = {}
): DocumentModel {
  const wanted = new Map<string, DesiredSection>();
  const order: string[] = [];
  for (const section of desired) {
    const normalized = normalizeDesiredSection(section);
    if (!wanted.has(normalized.header)) order.push(normalized.header);
    wanted.set(normalized.header, normalized);
  }

  const placed = new Set<string>();
  const sections: Section[] = [];

  for (const section of current.sections) {
    const target = wanted.get(section.header);
    if (target) {
      if (placed.has(section.header)) continue;
      placed.add(section.header);
      if (sameEntries(section.entries, target.entries)) {
        sections.push(section);
        continue;
      }
      // comments above the header stay; the body is replaced in full
      const replacement: Section = {
        header: target.header,
        entries: target.entries.map(([k, v]): Entry => [k, v]),
      };
      if (section.leading) replacement.leading = [...section.leading];
      sections.push(replacement);
      continue;
    }

    if (options.staleScope?.(section)) continue;
    sections.push(section);
  }

  for (const header of order) {
    if (placed.has(header)) continue;
    const target = wanted.get(header);
    if (!target) continue;
    sections.push({ header, entries: target.entries.map(([k, v]): Entry => [k, v]) });
  }

  return {
    preamble: [...current.preamble],
    sections,
    trailingNewline: current.trailingNewline,
  };
}

/** Compare two documents by header, for reporting what a reconciliation did. */
export function diffDocuments(before: DocumentModel, after: DocumentModel): DocumentDiff {
  const previous = new Map<string, Section>();
  for (const section of before.sections) {
    if (!previous.has(section.header)) previous.set(section.header, section);
  }
  const seen = new Set<string>();
  const diff: DocumentDiff = { added: [], updated: [], removed: [], unchanged: [] };

  for (const section of after.sections) {
    if (seen.has(section.header)) continue;
    seen.add(section.header);
    const old = previous.get(section.header);
    if (!old) diff.added.push(section.header);
    else if (old === section || sameEntries(old.entries, section.entries)) {
      diff.unchanged.push(section.header);
    } else diff.updated.push(section.header);
  }

  for (const header of previous.keys()) {
    if (!seen.has(header)) diff.removed.push(header);
  }

  return diff;
}
