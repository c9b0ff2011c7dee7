import * as path from "path";
import { configFromEnv } from "../lib/config.js";
import { fmt } from "../lib/format.js";
import { LicenseManager } from "../lib/manager.js";

export interface KeygenOptions {
  outDir: string;
  bits?: number;
}

export interface KeygenResult {
  privateKeyPath: string;
  publicKeyPath: string;
  keyId: string;
}

/**
 * Generate a fresh RSA key pair and write it as private.pem / public.pem
 */
export function keygenCommand(options: KeygenOptions): KeygenResult {
  const env = configFromEnv();
  const manager = new LicenseManager({
    ...env,
    privateKeyPem: undefined,
    privateKeyPath: undefined,
    publicKeyPem: undefined,
    publicKeyPath: undefined,
    keySize: options.bits ?? env.keySize,
    generatorMode: true,
  });

  const privateKeyPath = path.join(options.outDir, "private.pem");
  const publicKeyPath = path.join(options.outDir, "public.pem");
  manager.saveKeys(privateKeyPath, publicKeyPath);

  console.log(fmt.written("private key to", privateKeyPath));
  console.log(fmt.written("public key to", publicKeyPath));
  console.log(fmt.field("Key ID", manager.getKeyId()));

  return { privateKeyPath, publicKeyPath, keyId: manager.getKeyId() };
}
