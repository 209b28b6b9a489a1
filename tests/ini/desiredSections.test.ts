import { describe, it, expect } from "vitest";
import { parseDocument } from "../../src/ini/documentCodec";
import {
  profileName,
  profileSections,
  sessionProfileScope,
  ssoSessionHeader,
  ssoSessionSection,
} from "../../src/ini/desiredSections";

describe("desiredSections — builders", () => {
  it("should build an sso-session section with default scopes", () => {
    expect(
      ssoSessionSection({ name: "corp", startUrl: "https://corp.example.com/start", region: "eu-west-1" })
    ).toEqual({
      header: "sso-session corp",
      entries: [
        ["sso_start_url", "https://corp.example.com/start"],
        ["sso_region", "eu-west-1"],
        ["sso_registration_scopes", "sso:account:access"],
      ],
    });
  });

  it("should keep explicit registration scopes", () => {
    const section = ssoSessionSection({
      name: "corp",
      startUrl: "https://corp.example.com/start",
      region: "eu-west-1",
      registrationScopes: "sso:account:access,codewhisperer:completions",
    });

    expect(section.entries[2]).toEqual(["sso_registration_scopes", "sso:account:access,codewhisperer:completions"]);
  });

  it("should name profiles <account>-<role>", () => {
    expect(profileName("111111111111", "AdminRole")).toBe("111111111111-AdminRole");
    expect(ssoSessionHeader("corp")).toBe("sso-session corp");
  });

  it("should build one profile per role with text output by default", () => {
    const sections = profileSections("corp", [
      { accountId: "111111111111", roleName: "AdminRole", region: "eu-west-1" },
      { accountId: "222222222222", roleName: "ReadOnlyRole", region: "us-east-1" },
    ]);

    expect(sections.map((s) => s.header)).toEqual([
      "profile 111111111111-AdminRole",
      "profile 222222222222-ReadOnlyRole",
    ]);
    expect(sections[1].entries).toEqual([
      ["sso_session", "corp"],
      ["sso_account_id", "222222222222"],
      ["sso_role_name", "ReadOnlyRole"],
      ["region", "us-east-1"],
      ["output", "text"],
    ]);
  });
});

describe("desiredSections — sessionProfileScope", () => {
  const doc = parseDocument(
    [
      "[profile 111111111111-AdminRole]",
      "sso_session = corp",
      "[profile 111111111111-Other]",
      "sso_session = other",
      "[profile dev]",
      "sso_session = corp",
      "[sso-session corp]",
      "sso_region = eu-west-1",
      "[profile 1111-Short]",
      "sso_session = corp",
      "",
    ].join("\n")
  );

  it("should only claim generated profiles of the named session", () => {
    const scope = sessionProfileScope("corp");

    expect(doc.sections.map((s) => scope(s))).toEqual([true, false, false, false, true]);
  });

  it("should claim short numeric account ids", () => {
    const short = parseDocument("[profile 1-A]\nsso_session = corp\n[profile 1-B]\nsso_session = corp\n");

    expect(short.sections.map((s) => sessionProfileScope("corp")(s))).toEqual([true, true]);
  });
});
