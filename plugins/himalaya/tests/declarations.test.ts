import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { DeclarationError, loadDeclarations, parseDeclarations } from "../src/declarations.js";
import { EXAMPLE_DECLARATIONS } from "./helpers.js";

describe("loadDeclarations", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("should parse the example declarations", () => {
    const options = loadDeclarations(EXAMPLE_DECLARATIONS);
    expect(options.programs.himalaya.enable).toBe(true);
    expect(options.programs.himalaya.settings["signature-delim"]).toBeNull();
    expect(options.services["himalaya-watch"].settings.account).toBe("personal");
    expect(Object.keys(options.accounts.email.accounts)).toEqual(["personal", "archive", "work"]);

    const personal = options.accounts.email.accounts.personal;
    expect(personal.imap?.tls).toEqual({ enable: true, useStartTls: false });
    expect(personal.smtp?.tls).toEqual({ enable: true, useStartTls: true });
    expect(options.accounts.email.accounts.work.himalaya.enable).toBe(false);
  });

  it("should report an unreadable file", () => {
    expect(() => loadDeclarations("/nonexistent/accounts.yaml")).toThrow(
      /^Cannot read \/nonexistent\/accounts\.yaml/,
    );
  });

  it("should report YAML syntax errors", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "himalaya-hm-"));
    const file = path.join(tmpDir, "broken.yaml");
    fs.writeFileSync(file, "programs: [unclosed\n");
    expect(() => loadDeclarations(file)).toThrow(DeclarationError);
    expect(() => loadDeclarations(file)).toThrow(/^Invalid YAML in /);
  });

  it("should treat an empty file as all defaults", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "himalaya-hm-"));
    const file = path.join(tmpDir, "empty.yaml");
    fs.writeFileSync(file, "");
    const options = loadDeclarations(file);
    expect(options.programs.himalaya.enable).toBe(false);
    expect(options.accounts.email.accounts).toEqual({});
  });
});

describe("parseDeclarations", () => {
  it("should apply defaults", () => {
    const options = parseDeclarations({
      accounts: { email: { maildirBasePath: "/mail", accounts: { bob: { address: "bob@example.com" } } } },
    });
    const bob = options.accounts.email.accounts.bob;
    expect(bob.primary).toBe(false);
    expect(bob.folders).toEqual({ inbox: "Inbox", sent: "Sent", drafts: "Drafts", trash: "Trash" });
    expect(bob.imap).toBeNull();
    expect(bob.signature.showSignature).toBe("none");
    expect(bob.himalaya).toEqual({ enable: false, settings: {} });
    expect(options.programs.himalaya.package).toBe("/usr");
    expect(options.services["himalaya-watch"]).toEqual({
      enable: false,
      environment: {},
      settings: { account: null },
    });
  });

  it("should list every structural issue with its path", () => {
    try {
      parseDeclarations({
        accounts: { email: { accounts: { bad: { imap: { host: "imap.example.com", port: "993" } } } } },
      });
      expect.unreachable("parseDeclarations should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(DeclarationError);
      if (!(err instanceof DeclarationError)) return;
      expect(err.issues).toEqual([
        "accounts.email.accounts.bad.address: Required",
        "accounts.email.accounts.bad.imap.port: Expected number, received string",
      ]);
    }
  });

  it("should reject an unknown signature mode", () => {
    expect(() =>
      parseDeclarations({
        accounts: {
          email: { accounts: { bob: { address: "bob@example.com", signature: { showSignature: "never" } } } },
        },
      }),
    ).toThrow(/accounts\.email\.accounts\.bob\.signature\.showSignature/);
  });
});
