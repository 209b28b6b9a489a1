import { describe, it, expect } from "vitest";
import { parseDocument, renderSection, serializeDocument } from "../../src/ini/documentCodec";
import { getEntry, sectionHeaders } from "../../src/ini/documentModel";
import { MalformedDocumentError } from "../../src/errors";

const SAMPLE = [
  "# managed by hand",
  "",
  "[default]",
  "region=eu-west-1",
  "output =  json  ",
  "",
  "; dev account",
  "[profile dev]",
  "sso_session = corp",
  "s3 =",
  "  max_concurrent_requests = 20",
  "",
].join("\n");

describe("documentCodec — parseDocument", () => {
  it("should keep preamble lines before the first header", () => {
    const doc = parseDocument(SAMPLE);

    expect(doc.preamble).toEqual(["# managed by hand", ""]);
    expect(sectionHeaders(doc)).toEqual(["default", "profile dev"]);
    expect(doc.trailingNewline).toBe(true);
  });

  it("should trim keys and values of entries", () => {
    const doc = parseDocument(SAMPLE);

    expect(doc.sections[0].entries).toEqual([
      ["region", "eu-west-1"],
      ["output", "json"],
    ]);
  });

  it("should attach comments above a header to that section and blank lines to the one before", () => {
    const doc = parseDocument(SAMPLE);

    expect(doc.sections[0].raw).toEqual(["[default]", "region=eu-west-1", "output =  json  ", ""]);
    expect(doc.sections[0].leading).toBeUndefined();
    expect(doc.sections[1].leading).toEqual(["; dev account"]);
    expect(doc.sections[1].raw?.[0]).toBe("[profile dev]");
  });

  it("should keep blank lines between a comment and its header in the leading block", () => {
    const doc = parseDocument("[a]\nk = 1\n\n# about b\n\n[b]\n");

    expect(doc.sections[0].raw).toEqual(["[a]", "k = 1", ""]);
    expect(doc.sections[1].leading).toEqual(["# about b", ""]);
  });

  it("should keep comments between entries inside the section body", () => {
    const doc = parseDocument("[a]\nk = 1\n# note\nj = 2\n# tail\n");

    expect(doc.sections[0].raw).toEqual(["[a]", "k = 1", "# note", "j = 2", "# tail"]);
    expect(doc.sections[0].entries).toEqual([
      ["k", "1"],
      ["j", "2"],
    ]);
  });

  it("should keep indented nested-setting lines out of the entries", () => {
    const doc = parseDocument(SAMPLE);

    expect(doc.sections[1].entries).toEqual([
      ["sso_session", "corp"],
      ["s3", ""],
    ]);
    expect(doc.sections[1].raw).toContain("  max_concurrent_requests = 20");
  });

  it("should not let a nested region shadow the section's region", () => {
    const doc = parseDocument("[profile x]\nregion = eu-west-1\ns3 =\n  region = us-east-1\n");

    expect(getEntry(doc.sections[0], "region")).toBe("eu-west-1");
  });

  it("should keep duplicate headers and keys in encountered order", () => {
    const doc = parseDocument("[a]\nk = 1\nk = 2\n[a]\nk = 3\n");

    expect(sectionHeaders(doc)).toEqual(["a", "a"]);
    expect(doc.sections[0].entries).toEqual([
      ["k", "1"],
      ["k", "2"],
    ]);
    expect(getEntry(doc.sections[0], "k")).toBe("2");
  });

  it("should return an empty document for empty text", () => {
    const doc = parseDocument("");

    expect(doc).toEqual({ preamble: [], sections: [], trailingNewline: false });
  });

  it("should reject a key/value line before the first header", () => {
    const parse = () => parseDocument("# top\nregion = us-east-1\n[default]\n", "/tmp/config");

    expect(parse).toThrow(MalformedDocumentError);
    expect(parse).toThrow("Key/value line outside of any section at line 2: region = us-east-1");
  });

  it("should carry line number and path on MalformedDocumentError", () => {
    try {
      parseDocument("orphan\n", "/tmp/config");
      expect.unreachable("parseDocument should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedDocumentError);
      if (err instanceof MalformedDocumentError) {
        expect(err.lineNumber).toBe(1);
        expect(err.line).toBe("orphan");
        expect(err.path).toBe("/tmp/config");
      }
    }
  });
});

describe("documentCodec — serializeDocument", () => {
  it("should reproduce parsed text byte for byte", () => {
    const inputs = [
      SAMPLE,
      "",
      "\n",
      "[a]",
      "[a]\r\nk = v\r\n",
      "# only a comment",
      "[a]\nk=v\n\n\n[b]\n  x  =  y\n",
      "[a]\nk = 1\n\n# about b\n[b]\nk = 2\n# trailing\n",
      "# top\n\n# above a\n[a]\n",
    ];

    for (const text of inputs) {
      expect(serializeDocument(parseDocument(text))).toBe(text);
    }
  });

  it("should render new sections canonically with one blank line between them", () => {
    const text = serializeDocument({
      preamble: [],
      sections: [
        { header: "a", entries: [["k", "1"]] },
        { header: "b", entries: [["k", "2"]] },
      ],
      trailingNewline: false,
    });

    expect(text).toBe("[a]\nk = 1\n\n[b]\nk = 2\n");
  });

  it("should separate a rendered section from a preceding raw one", () => {
    const doc = parseDocument("[a]\nk = 1");
    doc.sections.push({ header: "b", entries: [["k", "2"]] });

    expect(serializeDocument(doc)).toBe("[a]\nk = 1\n\n[b]\nk = 2\n");
  });

  it("should not add a second blank line when the raw section already ends with one", () => {
    const doc = parseDocument("[a]\nk = 1\n\n");
    doc.sections.push({ header: "b", entries: [["k", "2"]] });

    expect(serializeDocument(doc)).toBe("[a]\nk = 1\n\n[b]\nk = 2\n");
  });

  it("should be stable when re-parsing its own output", () => {
    const first = serializeDocument({
      preamble: ["# header"],
      sections: [{ header: "sso-session corp", entries: [["sso_region", "eu-west-1"]] }],
      trailingNewline: false,
    });

    expect(first).toBe("# header\n\n[sso-session corp]\nsso_region = eu-west-1\n");
    expect(serializeDocument(parseDocument(first))).toBe(first);
  });
});

describe("documentCodec — renderSection", () => {
  it("should render header then key = value lines", () => {
    expect(renderSection({ header: "profile x", entries: [["region", "us-east-1"]] })).toEqual([
      "[profile x]",
      "region = us-east-1",
    ]);
  });
});
