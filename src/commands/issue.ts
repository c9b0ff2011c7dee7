import { newBuilder } from "../lib/builder.js";
import { configFromEnv } from "../lib/config.js";
import { LicenseError } from "../lib/errors.js";
import { fmt } from "../lib/format.js";
import { formatExpiry } from "../lib/helpers.js";
import { LicenseManager } from "../lib/manager.js";
import type { SignedLicense } from "../lib/types.js";
import { parseFeature, parseKeyValue, parseLimit, parseService } from "./parse.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface IssueOptions {
  privateKey?: string;
  customer: string;
  appId: string;
  service: string[];
  limit?: string[];
  feature?: string[];
  metadata?: string[];
  expiresInDays?: number;
  licenseVersion?: string;
  environment?: string;
  out?: string;
}

/**
 * Build, sign and optionally save a license. Without --out the license JSON
 * is printed to stdout.
 */
export function issueCommand(options: IssueOptions): SignedLicense {
  const env = configFromEnv();
  if (!options.privateKey && !env.privateKeyPem && !env.privateKeyPath) {
    throw new LicenseError("invalid_config", {
      message:
        "no private key configured: pass --private-key or set LICENSE_PRIVATE_KEY_PATH (create one with `licensekit keygen`)",
    });
  }

  const manager = new LicenseManager({
    ...env,
    privateKeyPath: options.privateKey ?? env.privateKeyPath,
    generatorMode: true,
  });

  const builder = newBuilder().withCustomer(options.customer).withAppId(options.appId);
  for (const service of options.service) builder.withService(parseService(service));
  for (const limit of options.limit ?? []) builder.withLimit(...parseLimit(limit));
  for (const feature of options.feature ?? []) builder.withFeature(...parseFeature(feature));
  for (const entry of options.metadata ?? []) builder.withMetadata(...parseKeyValue(entry));
  if (options.expiresInDays !== undefined) builder.withExpirationDuration(options.expiresInDays * DAY_MS);
  if (options.licenseVersion) builder.withVersion(options.licenseVersion);
  if (options.environment) builder.withEnvironment(options.environment);

  builder.validate();
  const license = manager.generate(builder.build());

  if (options.out) {
    manager.saveLicense(license, options.out);
    console.log(fmt.written(`license for ${license.data.customer} to`, options.out));
    console.log(fmt.field("Expires", formatExpiry(license.data.expires_at ?? 0)));
  } else {
    console.log(JSON.stringify(license, null, 2));
  }

  return license;
}
