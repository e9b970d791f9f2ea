/**
 * @otpkeep/store
 *
 * SQLite token storage and FreeOTP-compatible backup files
 *
 * @packageDocumentation
 */

export { TokenStore, type TokenStoreOptions } from "./token-store";
export {
  BackupFormatError,
  backupRecordFromToken,
  buildBackup,
  tokenFromBackupRecord,
  tokensFromBackup,
  type BackupFile,
  type BackupTokenRecord,
} from "./backup";
export { TOKEN_COLUMNS } from "./sql";
