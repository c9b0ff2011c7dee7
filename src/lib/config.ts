/**
 * Manager configuration, optionally read from environment variables
 */

import { LicenseError } from "./errors.js";
import { DEFAULT_KEY_SIZE, systemClock, type Clock } from "./types.js";

export interface LicenseLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface ManagerConfig {
  // Signing key (generator mode only)
  privateKeyPem?: string;
  privateKeyPath?: string;

  // Verification key, overrides the one derived from the private key
  publicKeyPem?: string;
  publicKeyPath?: string;

  // RSA modulus length for freshly generated keys
  keySize?: number;

  generatorMode?: boolean;

  clock?: Clock;
  logger?: LicenseLogger;
}

export interface ResolvedConfig {
  privateKeyPem: string;
  privateKeyPath: string;
  publicKeyPem: string;
  publicKeyPath: string;
  keySize: number;
  generatorMode: boolean;
  clock: Clock;
  logger: LicenseLogger;
}

export const consoleLogger: LicenseLogger = {
  debug: (message) => console.debug(message),
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
};

export function resolveConfig(config: ManagerConfig): ResolvedConfig {
  const keySize = config.keySize || DEFAULT_KEY_SIZE;
  if (!Number.isInteger(keySize) || keySize < 512) {
    throw new LicenseError("invalid_config", {
      message: `key size must be an integer of at least 512 bits (got ${keySize})`,
      context: { keySize },
    });
  }

  return {
    privateKeyPem: config.privateKeyPem ?? "",
    privateKeyPath: config.privateKeyPath ?? "",
    publicKeyPem: config.publicKeyPem ?? "",
    publicKeyPath: config.publicKeyPath ?? "",
    keySize,
    generatorMode: config.generatorMode ?? false,
    clock: config.clock ?? systemClock,
    logger: config.logger ?? consoleLogger,
  };
}

/**
 * Build a manager config from LICENSE_* environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ManagerConfig {
  const config: ManagerConfig = {
    privateKeyPem: pemFromEnv(env.LICENSE_PRIVATE_KEY),
    privateKeyPath: env.LICENSE_PRIVATE_KEY_PATH || undefined,
    publicKeyPem: pemFromEnv(env.LICENSE_PUBLIC_KEY),
    publicKeyPath: env.LICENSE_PUBLIC_KEY_PATH || undefined,
    generatorMode: parseFlag(env.LICENSE_GENERATOR_MODE),
  };

  if (env.LICENSE_KEY_SIZE) {
    const keySize = parseInt(env.LICENSE_KEY_SIZE, 10);
    if (Number.isNaN(keySize) || String(keySize) !== env.LICENSE_KEY_SIZE.trim()) {
      throw new LicenseError("invalid_config", {
        message: `LICENSE_KEY_SIZE must be an integer (got "${env.LICENSE_KEY_SIZE}")`,
      });
    }
    config.keySize = keySize;
  }

  return config;
}

// Helpers
function pemFromEnv(value: string | undefined): string | undefined {
  if (!value) return undefined;
  // Single-line env values carry newlines as literal "\n"
  return value.replace(/\\n/g, "\n");
}

function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}
