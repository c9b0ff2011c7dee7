/**
 * License validation
 *
 * Runs every check against a signed license and collects all failures.
 * Nothing short-circuits: a tampered, expired and incomplete license reports
 * all three problems at once.
 */

import type * as crypto from "crypto";
import type { LicenseLogger } from "./config.js";
import { verifyContent } from "./license.js";
import { toUnixSeconds, type LicenseContent, type SignedLicense, type ValidationResult } from "./types.js";

export const SIGNATURE_FAILED = "signature verification failed";
export const LICENSE_HAS_EXPIRED = "license has expired";
export const CUSTOMER_REQUIRED = "customer is required";
export const APP_ID_REQUIRED = "app ID is required";
export const SERVICE_REQUIRED = "at least one service is required";

export interface ValidationContext {
  publicKey: crypto.KeyObject;
  now: Date;
  logger?: LicenseLogger;
}

export function validateSignedLicense(license: SignedLicense, ctx: ValidationContext): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { data } = license;

  if (!verifyContent(data, license.signature, ctx.publicKey, ctx.logger)) {
    errors.push(SIGNATURE_FAILED);
  }

  if (isContentExpired(data, ctx.now)) {
    errors.push(LICENSE_HAS_EXPIRED);
  }

  if (!data.customer) {
    errors.push(CUSTOMER_REQUIRED);
  }

  if (!data.app_id) {
    errors.push(APP_ID_REQUIRED);
  }

  if (data.services.length === 0) {
    errors.push(SERVICE_REQUIRED);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Expired once the current second is past `expires_at`. Perpetual licenses
 * (`expires_at` 0 or absent) never expire.
 */
export function isContentExpired(content: LicenseContent, now: Date): boolean {
  const expiresAt = content.expires_at ?? 0;
  return expiresAt > 0 && toUnixSeconds(now) > expiresAt;
}
