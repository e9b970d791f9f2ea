/**
 * @otpkeep/vault
 *
 * Token vault: configuration, SQLite storage and OTP engine behind one
 * object.
 *
 * @packageDocumentation
 */

export {
  Vault,
  SPINNER_STYLES,
  type VaultOptions,
  type TokenQuery,
  type NewTokenFields,
  type TokenChanges,
  type ListOptions,
} from "./vault";
