import fs from "fs";
import os from "os";
import path from "path";
import { WriteError, errorCode, errorMessage } from "../errors";
import { parseDocument, serializeDocument } from "../ini/documentCodec";
import { type DesiredSection, type DocumentModel } from "../ini/documentModel";
import {
  type AccountRole,
  DEFAULT_PROFILE_OUTPUT,
  type SsoSessionConfig,
  profileSections,
  sessionProfileScope,
  ssoSessionSection,
} from "../ini/desiredSections";
import { type DocumentDiff, type ReconcileOptions, diffDocuments, reconcile } from "../ini/sectionReconciler";
import { type TransactionDeps, type TransactionResult, runFileTransaction } from "./fileTransaction";

export interface ConfigInstallerOptions extends TransactionDeps {
  configPath?: string;
}

export interface ConfigInstallResult extends TransactionResult {
  document: DocumentModel;
  diff: DocumentDiff;
}

export function defaultAwsConfigPath(): string {
  return path.join(os.homedir(), ".aws", "config");
}

/** Applies desired sections to the AWS config file through a locked, backed-up transaction. */
export class ConfigInstaller {
  readonly configPath: string;
  private readonly deps: TransactionDeps;

  constructor(options: ConfigInstallerOptions = {}) {
    const { configPath, ...deps } = options;
    this.configPath = configPath ?? defaultAwsConfigPath();
    this.deps = deps;
  }

  async read(): Promise<DocumentModel> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.configPath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return parseDocument("");
      throw new WriteError(this.configPath, `cannot read: ${errorMessage(err)}`, errorCode(err), err);
    }
    return parseDocument(text, this.configPath);
  }

  async installSections(
    desired: readonly DesiredSection[],
    options: ReconcileOptions = {}
  ): Promise<ConfigInstallResult> {
    let before: DocumentModel | undefined;
    let after: DocumentModel | undefined;

    const result = await runFileTransaction(
      this.configPath,
      (current) => {
        before = parseDocument(current, this.configPath);
        after = reconcile(before, desired, options);
        return serializeDocument(after);
      },
      this.deps
    );

    // compute always runs inside the transaction; these are set by now
    const document = after ?? parseDocument(result.content, this.configPath);
    const diff = diffDocuments(before ?? document, document);
    return { ...result, document, diff };
  }

  installSsoSession(session: SsoSessionConfig): Promise<ConfigInstallResult> {
    return this.installSections([ssoSessionSection(session)]);
  }

  /**
   * Make the session's `<account>-<role>` profiles mirror `roles` exactly:
   * new roles are added, existing ones refreshed, revoked ones deleted.
   */
  syncSessionProfiles(
    sessionName: string,
    roles: readonly AccountRole[],
    output: string = DEFAULT_PROFILE_OUTPUT
  ): Promise<ConfigInstallResult> {
    return this.installSections(profileSections(sessionName, roles, output), {
      staleScope: sessionProfileScope(sessionName),
    });
  }
}
