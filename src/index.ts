export * from "./errors";
export * from "./ini/documentModel";
export * from "./ini/documentCodec";
export * from "./ini/sectionReconciler";
export * from "./ini/desiredSections";
export * from "./files/atomicWriter";
export * from "./files/backupManager";
export * from "./files/fileLock";
export * from "./shell/shellDetector";
export * from "./shell/markedBlockEditor";
export * from "./shell/scriptTemplates";
export * from "./installers/fileTransaction";
export * from "./installers/configInstaller";
export * from "./installers/shellInstaller";
export * from "./aws/ssoTokenCache";
export * from "./aws/ssoDiscovery";
export * from "./aws/ssoProfiles";
export * from "./settings";
export { createProgram, type CliContext } from "./cli";
