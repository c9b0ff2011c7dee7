/**
 * RSA key material: generation, PEM parsing and export
 */

import * as crypto from "crypto";
import { v5 as uuidv5 } from "uuid";
import type { LicenseLogger, ResolvedConfig } from "./config.js";
import { LicenseError, describeCause } from "./errors.js";
import { readTextFile } from "./storage.js";

export interface KeyMaterial {
  privateKey?: crypto.KeyObject;
  publicKey: crypto.KeyObject;
}

// Namespace for name-based key identifiers
const KEY_ID_NAMESPACE = "6f1f0a52-3c7e-4f0b-9a43-2d6c1e9b7a10";

const PRIVATE_PEM_HEADER = /-----BEGIN (RSA )?PRIVATE KEY-----/;
const PUBLIC_PEM_HEADER = /-----BEGIN (RSA )?PUBLIC KEY-----/;

/**
 * Resolve the key pair a manager works with.
 *
 * In generator mode the private key comes from PEM text, then a PEM file,
 * then a fresh key pair, and the public key is derived from it. A separately
 * supplied public key always replaces the verification key.
 */
export function resolveKeyMaterial(config: ResolvedConfig): KeyMaterial {
  let privateKey: crypto.KeyObject | undefined;
  let publicKey: crypto.KeyObject | undefined;

  if (config.generatorMode) {
    privateKey = resolvePrivateKey(config);
    publicKey = crypto.createPublicKey(privateKey);
  }

  if (config.publicKeyPem) {
    publicKey = parsePublicKeyPem(config.publicKeyPem);
  } else if (config.publicKeyPath) {
    publicKey = parsePublicKeyPem(readTextFile(config.publicKeyPath, "public key"));
    config.logger.debug(`[keys] Loaded public key from ${config.publicKeyPath}`);
  }

  if (!publicKey) {
    throw new LicenseError("no_public_key");
  }

  return { privateKey, publicKey };
}

function resolvePrivateKey(config: ResolvedConfig): crypto.KeyObject {
  if (config.privateKeyPem) {
    return parsePrivateKeyPem(config.privateKeyPem);
  }

  if (config.privateKeyPath) {
    const key = parsePrivateKeyPem(readTextFile(config.privateKeyPath, "private key"));
    config.logger.debug(`[keys] Loaded private key from ${config.privateKeyPath}`);
    return key;
  }

  return generatePrivateKey(config.keySize, config.logger);
}

export function generatePrivateKey(modulusLength: number, logger?: LicenseLogger): crypto.KeyObject {
  const { privateKey } = crypto.generateKeyPairSync("rsa", { modulusLength });
  logger?.info(`[keys] Generated new ${modulusLength}-bit RSA key pair`);
  return privateKey;
}

export function parsePrivateKeyPem(pem: string): crypto.KeyObject {
  if (!PRIVATE_PEM_HEADER.test(pem)) {
    throw new LicenseError("invalid_private_key", {
      message: "invalid private key: no PEM private key block found",
    });
  }

  let key: crypto.KeyObject;
  try {
    key = crypto.createPrivateKey({ key: pem, format: "pem" });
  } catch (err) {
    throw new LicenseError("invalid_private_key", {
      message: `invalid private key: ${describeCause(err)}`,
      cause: err,
    });
  }

  if (key.asymmetricKeyType !== "rsa") {
    throw new LicenseError("invalid_private_key", {
      message: `invalid private key: expected RSA, got ${key.asymmetricKeyType ?? "unknown"}`,
    });
  }
  return key;
}

export function parsePublicKeyPem(pem: string): crypto.KeyObject {
  if (!PUBLIC_PEM_HEADER.test(pem)) {
    throw new LicenseError("invalid_public_key", {
      message: "invalid public key: no PEM public key block found",
    });
  }

  let key: crypto.KeyObject;
  try {
    key = crypto.createPublicKey({ key: pem, format: "pem" });
  } catch (err) {
    throw new LicenseError("invalid_public_key", {
      message: `invalid public key: ${describeCause(err)}`,
      cause: err,
    });
  }

  if (key.asymmetricKeyType !== "rsa") {
    throw new LicenseError("invalid_public_key", {
      message: `invalid public key: expected RSA, got ${key.asymmetricKeyType ?? "unknown"}`,
    });
  }
  return key;
}

/** PKCS#1 "RSA PRIVATE KEY" block. */
export function exportPrivateKeyPem(key: crypto.KeyObject): string {
  return pemToString(key.export({ type: "pkcs1", format: "pem" }));
}

/** PKIX "PUBLIC KEY" block. */
export function exportPublicKeyPem(key: crypto.KeyObject): string {
  return pemToString(key.export({ type: "spki", format: "pem" }));
}

/**
 * Stable identifier for a key pair: a v5 UUID over the SHA-256 of the
 * public key's SPKI encoding.
 */
export function keyIdFor(key: crypto.KeyObject): string {
  const publicKey = key.type === "private" ? crypto.createPublicKey(key) : key;
  const der = publicKey.export({ type: "spki", format: "der" });
  const fingerprint = crypto.createHash("sha256").update(der).digest("hex");
  return uuidv5(fingerprint, KEY_ID_NAMESPACE);
}

function pemToString(pem: string | Buffer): string {
  return typeof pem === "string" ? pem : pem.toString("utf-8");
}
