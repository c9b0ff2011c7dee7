/**
 * licensekit
 * ==========
 * Offline software licenses: a vendor-side generator signs license content
 * with an RSA private key, and the shipped product verifies it with the
 * public key alone.
 *
 * Handles:
 * - Key pair generation, PEM loading and export
 * - Canonical signing and verification of license content
 * - Validation with itemized errors (signature, expiry, required fields)
 * - License files on disk
 *
 * Does NOT handle:
 * - Online activation or revocation
 * - Selecting among several trusted keys (key_id is informational)
 */

export { LicenseManager, type LoadedLicense } from "./lib/manager.js";
export { LicenseBuilder, newBuilder, assertGeneratable } from "./lib/builder.js";
export { configFromEnv, consoleLogger, type LicenseLogger, type ManagerConfig } from "./lib/config.js";
export { LicenseError, isLicenseError, type LicenseErrorKind } from "./lib/errors.js";
export { canonicalize, signContent, verifyContent } from "./lib/license.js";
export {
  exportPrivateKeyPem,
  exportPublicKeyPem,
  generatePrivateKey,
  keyIdFor,
  parsePrivateKeyPem,
  parsePublicKeyPem,
} from "./lib/keys.js";
export {
  validateSignedLicense,
  isContentExpired,
  SIGNATURE_FAILED,
  LICENSE_HAS_EXPIRED,
  CUSTOMER_REQUIRED,
  APP_ID_REQUIRED,
  SERVICE_REQUIRED,
} from "./lib/validation.js";
export { decodeSignedLicense, encodeSignedLicense } from "./lib/storage.js";
export {
  hasService,
  hasServiceById,
  hasServiceByName,
  hasFeature,
  getLimit,
  isExpiringSoon,
  calculateRemainingTime,
  formatTimeUntilExpiry,
  formatExpiry,
  formatDuration,
  getLicenseStatus,
} from "./lib/helpers.js";
export {
  DEFAULT_KEY_SIZE,
  SIGNING_ALGORITHM,
  STATUS_ACTIVE,
  STATUS_EXPIRED,
  LICENSE_EXPIRED,
  LICENSE_NEVER_EXPIRED,
  systemClock,
  toUnixSeconds,
  type Clock,
  type LicenseContent,
  type LicenseInfo,
  type LicenseStatus,
  type Service,
  type SignedLicense,
  type ValidationResult,
} from "./lib/types.js";
