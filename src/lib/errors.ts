/**
 * License errors
 *
 * Every fault the library raises is a LicenseError tagged with one kind from
 * a closed set. Callers match on `kind`, never on message text or identity.
 * Validation failures are not errors: they come back as a ValidationResult.
 */

export type LicenseErrorKind =
  // configuration
  | "invalid_private_key"
  | "invalid_public_key"
  | "no_public_key"
  | "invalid_config"
  // mode
  | "generator_mode_required"
  // content
  | "customer_required"
  | "app_id_required"
  | "no_services"
  // expiry
  | "license_expired"
  // storage
  | "io"
  | "format";

const DEFAULT_MESSAGES: Record<LicenseErrorKind, string> = {
  invalid_private_key: "invalid private key",
  invalid_public_key: "invalid public key",
  no_public_key: "no public key provided",
  invalid_config: "invalid configuration",
  generator_mode_required: "generator mode is required",
  customer_required: "customer name is required",
  app_id_required: "application ID is required",
  no_services: "at least one service must be allowed",
  license_expired: "license has expired",
  io: "i/o failure",
  format: "failed to decode license",
};

export interface LicenseErrorOptions {
  message?: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class LicenseError extends Error {
  public readonly kind: LicenseErrorKind;
  public readonly context?: Record<string, unknown>;

  constructor(kind: LicenseErrorKind, options: LicenseErrorOptions = {}) {
    super(options.message ?? DEFAULT_MESSAGES[kind], { cause: options.cause });
    this.name = "LicenseError";
    this.kind = kind;
    this.context = options.context;
  }
}

export function isLicenseError(value: unknown, kind?: LicenseErrorKind): value is LicenseError {
  if (!(value instanceof LicenseError)) return false;
  return kind === undefined || value.kind === kind;
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
