import { configFromEnv } from "../lib/config.js";
import { fmt } from "../lib/format.js";
import { formatExpiry } from "../lib/helpers.js";
import { LicenseManager } from "../lib/manager.js";
import type { LicenseInfo, ValidationResult } from "../lib/types.js";

export interface VerifyOptions {
  publicKey?: string;
}

function validatorFor(options: VerifyOptions): LicenseManager {
  const env = configFromEnv();
  return new LicenseManager({
    ...env,
    publicKeyPath: options.publicKey ?? env.publicKeyPath,
    generatorMode: false,
  });
}

/**
 * Validate a license file against a public key
 */
export function verifyCommand(file: string, options: VerifyOptions): ValidationResult {
  const { result } = validatorFor(options).loadAndValidate(file);

  if (result.valid) {
    console.log(fmt.verdict(true, file));
  } else {
    console.log(fmt.verdict(false, file));
    for (const error of result.errors) console.log(`  - ${error}`);
  }
  for (const warning of result.warnings) console.log(fmt.notice(warning));

  return result;
}

export interface InfoResult {
  info: LicenseInfo;
  result: ValidationResult;
}

/**
 * Show what a license grants, after validating it
 */
export function infoCommand(file: string, options: VerifyOptions): InfoResult {
  const manager = validatorFor(options);
  const { license, result } = manager.loadAndValidate(file);
  const info = manager.getLicenseInfo(license.data);

  console.log(fmt.section(`License: ${info.customer}`));
  console.log(fmt.field("App ID", info.appId));
  console.log(fmt.field("Status", info.status));
  console.log(fmt.field("Validation", result.valid ? "passed" : result.errors.join(", ")));
  console.log(fmt.field("Issued", info.issuedAt.toISOString()));
  console.log(fmt.field("Expires", formatExpiry(license.data.expires_at ?? 0)));
  console.log(fmt.field("Remaining", info.timeUntilExpiry));
  if (info.version) console.log(fmt.field("Version", info.version));
  if (info.environment) console.log(fmt.field("Environment", info.environment));

  for (const service of info.services) {
    console.log(fmt.field("Service", `${service.id} (${service.name})`));
  }
  for (const [name, value] of Object.entries(info.limits)) {
    console.log(fmt.field("Limit", `${name} = ${value}`));
  }
  for (const [name, enabled] of Object.entries(info.features)) {
    console.log(fmt.field("Feature", `${name} ${enabled ? "on" : "off"}`));
  }

  return { info, result };
}
