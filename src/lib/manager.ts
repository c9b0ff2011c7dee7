/**
 * License manager
 * ===============
 * Issues and verifies signed licenses with one resolved key pair.
 *
 * Modes:
 * - Generator: holds a private key, can sign new licenses
 * - Validator: public key only, generate() fails with generator_mode_required
 *
 * Keys are resolved once in the constructor and never change afterwards.
 */

import type * as crypto from "crypto";
import { assertGeneratable, cloneContent } from "./builder.js";
import { resolveConfig, type LicenseLogger, type ManagerConfig } from "./config.js";
import { LicenseError } from "./errors.js";
import { formatTimeUntilExpiry, getLicenseStatus } from "./helpers.js";
import { exportPrivateKeyPem, exportPublicKeyPem, keyIdFor, resolveKeyMaterial } from "./keys.js";
import { signContent } from "./license.js";
import { decodeSignedLicense, encodeSignedLicense, readTextFile, writeTextFile } from "./storage.js";
import {
  SIGNING_ALGORITHM,
  toUnixSeconds,
  type Clock,
  type LicenseContent,
  type LicenseInfo,
  type SignedLicense,
  type ValidationResult,
} from "./types.js";
import { isContentExpired, validateSignedLicense } from "./validation.js";

export interface LoadedLicense {
  license: SignedLicense;
  result: ValidationResult;
}

export class LicenseManager {
  private readonly privateKey?: crypto.KeyObject;
  private readonly publicKey: crypto.KeyObject;
  private readonly keyId: string;
  private readonly generatorMode: boolean;
  private readonly clock: Clock;
  private readonly logger: LicenseLogger;

  constructor(config: ManagerConfig) {
    const resolved = resolveConfig(config);
    const keys = resolveKeyMaterial(resolved);

    this.privateKey = keys.privateKey;
    this.publicKey = keys.publicKey;
    this.generatorMode = resolved.generatorMode;
    this.clock = resolved.clock;
    this.logger = resolved.logger;
    // Identifies the key that signs, which may differ from the override
    this.keyId = keyIdFor(this.privateKey ?? this.publicKey);
  }

  isGeneratorMode(): boolean {
    return this.generatorMode;
  }

  /**
   * Sign license content. The caller's record is not modified; an unset
   * `issued_at` is stamped on the returned copy.
   */
  generate(content: LicenseContent): SignedLicense {
    const privateKey = this.requirePrivateKey();
    assertGeneratable(content);

    const data = cloneContent(content);
    const now = toUnixSeconds(this.clock());
    if (!data.issued_at) {
      data.issued_at = now;
    }

    const signature = signContent(data, privateKey);
    this.logger.debug(`[manager] Signed license for ${data.customer} (${data.app_id})`);

    return {
      data,
      signature,
      key_id: this.keyId,
      algorithm: SIGNING_ALGORITHM,
      created_at: now,
    };
  }

  validate(license: SignedLicense): ValidationResult {
    return validateSignedLicense(license, {
      publicKey: this.publicKey,
      now: this.clock(),
      logger: this.logger,
    });
  }

  saveLicense(license: SignedLicense, filePath: string): void {
    writeTextFile(filePath, encodeSignedLicense(license), "license");
  }

  loadLicense(filePath: string): SignedLicense {
    const raw = readTextFile(filePath, "license file");
    return decodeSignedLicense(raw);
  }

  /**
   * Load a license file and validate it. Read and decode failures throw;
   * an unacceptable license comes back in `result`.
   */
  loadAndValidate(filePath: string): LoadedLicense {
    const license = this.loadLicense(filePath);
    return { license, result: this.validate(license) };
  }

  isExpired(content: LicenseContent): boolean {
    return isContentExpired(content, this.clock());
  }

  isActive(content: LicenseContent): boolean {
    return !this.isExpired(content);
  }

  checkExpiration(content: LicenseContent): void {
    if (this.isExpired(content)) {
      throw new LicenseError("license_expired", { context: { expiresAt: content.expires_at } });
    }
  }

  getLicenseInfo(content: LicenseContent): LicenseInfo {
    const now = this.clock();
    const expiresAt = content.expires_at ?? 0;

    const info: LicenseInfo = {
      customer: content.customer,
      appId: content.app_id,
      issuedAt: new Date(content.issued_at * 1000),
      status: getLicenseStatus(content, now),
      timeUntilExpiry: formatTimeUntilExpiry(expiresAt, now),
      services: content.services.map((s) => ({ ...s })),
      limits: { ...content.limits },
      features: { ...content.features },
      metadata: { ...content.metadata },
      version: content.version,
      environment: content.environment,
    };

    if (expiresAt > 0) {
      info.expiresAt = new Date(expiresAt * 1000);
    }
    return info;
  }

  exportPrivateKey(): string {
    return exportPrivateKeyPem(this.requirePrivateKey());
  }

  exportPublicKey(): string {
    return exportPublicKeyPem(this.publicKey);
  }

  exportKeys(): { privateKey: string; publicKey: string } {
    return { privateKey: this.exportPrivateKey(), publicKey: this.exportPublicKey() };
  }

  getPublicKey(): crypto.KeyObject {
    return this.publicKey;
  }

  getKeyId(): string {
    return this.keyId;
  }

  saveKeys(privateKeyPath: string, publicKeyPath: string): void {
    writeTextFile(privateKeyPath, this.exportPrivateKey(), "private key");
    writeTextFile(publicKeyPath, this.exportPublicKey(), "public key");
    this.logger.info(`[manager] Saved keys to ${privateKeyPath} and ${publicKeyPath}`);
  }

  savePublicKey(filePath: string): void {
    writeTextFile(filePath, this.exportPublicKey(), "public key");
  }

  private requirePrivateKey(): crypto.KeyObject {
    if (!this.generatorMode || !this.privateKey) {
      throw new LicenseError("generator_mode_required");
    }
    return this.privateKey;
  }
}
