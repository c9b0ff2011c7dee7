/**
 * License data model
 *
 * Field names follow the on-disk wire format (snake_case), the same way the
 * signed payload is read back from a license file.
 */

export const DEFAULT_KEY_SIZE = 2048;
export const SIGNING_ALGORITHM = "RS256";

export const STATUS_ACTIVE = "active";
export const STATUS_EXPIRED = "expired";

export const LICENSE_EXPIRED = "License expired";
export const LICENSE_NEVER_EXPIRED = "License never expired";

export type LicenseStatus = typeof STATUS_ACTIVE | typeof STATUS_EXPIRED;

export interface Service {
  id: string;
  name: string;
  description?: string;
  metadata?: Record<string, string>;
}

/**
 * The signable payload. Timestamps are unix seconds; `expires_at` of 0 (or
 * absent) means the license never expires.
 */
export interface LicenseContent {
  customer: string;
  app_id: string;
  services: Service[];
  limits?: Record<string, number>;
  features?: Record<string, boolean>;
  issued_at: number;
  expires_at?: number;
  metadata?: Record<string, string>;
  version?: string;
  environment?: string;
}

/**
 * Content plus its signature envelope. Only `data` is covered by the
 * signature.
 */
export interface SignedLicense {
  data: LicenseContent;
  signature: string;
  key_id?: string;
  algorithm?: string;
  created_at: number;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Presentation-oriented copy of a license's content. */
export interface LicenseInfo {
  customer: string;
  appId: string;
  issuedAt: Date;
  expiresAt?: Date;
  status: LicenseStatus;
  timeUntilExpiry: string;
  services: Service[];
  limits: Record<string, number>;
  features: Record<string, boolean>;
  metadata: Record<string, string>;
  version?: string;
  environment?: string;
}

/** Wall-clock source used for stamping and expiry checks. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
