export * from './core/errors.js';
export * from './core/result.js';
export { ErrorClassifier, type RawFailure, type ErrorPattern } from './core/errorClassifier.js';
export { runHelper, type HelperIO } from './core/helperRunner.js';
export * from './dokuwiki/index.js';
export { SessionManager, type SessionState, type SessionManagerOptions } from './session/sessionManager.js';
export { CookieStore } from './session/cookieStore.js';
export { GitCredentialHelper, type CredentialSource, type Credentials } from './session/credentials.js';
export { IdentityMap, type IdentityEntry, type SyncState } from './state/identityMap.js';
export { PathMapper, PathRegistry, type FileKind } from './mapping/pathMapper.js';
export { HistoryExporter, type ExportPlan } from './export/historyExporter.js';
export { FastImportWriter, type CommitRecord } from './export/fastImportWriter.js';
export { FastExportParser, type FastExportStream } from './import/fastExportParser.js';
export { PushImporter, type RefOutcome, type ConflictScope } from './import/pushImporter.js';
export { ProtocolSession, HelperAbort, type ProtocolSettings } from './protocol/session.js';
export { LineReader } from './protocol/lineReader.js';
export { buildConfig, parseRemoteUrl, type HelperConfig } from './util/config.js';
export { loadConfig } from './cli/configLoader.js';
export { Logger, logger, type LogLevel } from './util/logger.js';
