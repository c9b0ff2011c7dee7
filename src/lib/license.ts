/**
 * License signing and verification (RSA PKCS#1 v1.5 over SHA-256)
 */

import * as crypto from "crypto";
import type { LicenseLogger } from "./config.js";
import type { LicenseContent, Service } from "./types.js";

const DIGEST = "sha256";

/**
 * Sign license content, returning a base64 signature
 */
export function signContent(content: LicenseContent, privateKey: crypto.KeyObject): string {
  const message = Buffer.from(canonicalize(content), "utf-8");
  const signature = crypto.sign(DIGEST, message, {
    key: privateKey,
    padding: crypto.constants.RSA_PKCS1_PADDING,
  });

  return bytesToBase64(signature);
}

/**
 * Verify a base64 signature over license content. Every kind of failure
 * yields false; the reason is only logged.
 */
export function verifyContent(
  content: LicenseContent,
  signature: string,
  publicKey: crypto.KeyObject,
  logger?: LicenseLogger
): boolean {
  const sig = base64ToBytes(signature);
  if (!sig) {
    logger?.debug("[signer] Signature is not valid base64");
    return false;
  }

  try {
    const message = Buffer.from(canonicalize(content), "utf-8");
    const ok = crypto.verify(DIGEST, message, { key: publicKey, padding: crypto.constants.RSA_PKCS1_PADDING }, sig);
    if (!ok) {
      logger?.debug("[signer] Signature does not match license content");
    }
    return ok;
  } catch (err) {
    logger?.debug(`[signer] Signature check raised: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

/**
 * Deterministic JSON encoding of license content.
 *
 * Keys are emitted in a fixed order, map keys sorted, and optional fields
 * omitted when empty, so equal content always encodes to the same bytes.
 */
export function canonicalize(content: LicenseContent): string {
  const out: Record<string, unknown> = {
    customer: content.customer,
    app_id: content.app_id,
    services: content.services.map(canonicalService),
  };

  if (hasEntries(content.limits)) out.limits = sortKeys(content.limits);
  if (hasEntries(content.features)) out.features = sortKeys(content.features);
  out.issued_at = content.issued_at;
  if (content.expires_at) out.expires_at = content.expires_at;
  if (hasEntries(content.metadata)) out.metadata = sortKeys(content.metadata);
  if (content.version) out.version = content.version;
  if (content.environment) out.environment = content.environment;

  return JSON.stringify(out);
}

function canonicalService(service: Service): Record<string, unknown> {
  const out: Record<string, unknown> = { id: service.id, name: service.name };
  if (service.description) out.description = service.description;
  if (hasEntries(service.metadata)) out.metadata = sortKeys(service.metadata);
  return out;
}

// Helpers
function hasEntries<T>(record: Record<string, T> | undefined): record is Record<string, T> {
  return record !== undefined && Object.keys(record).length > 0;
}

// fromEntries defines own properties, so a "__proto__" key is kept and signed
function sortKeys<T>(record: Record<string, T>): Record<string, T> {
  return Object.fromEntries(Object.keys(record).sort().map((key): [string, T] => [key, record[key]]));
}

function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

// Buffer.from silently skips bad characters, so check the alphabet first
function base64ToBytes(base64: string): Uint8Array | null {
  if (base64.length === 0 || base64.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(base64)) {
    return null;
  }
  return new Uint8Array(Buffer.from(base64, "base64"));
}
