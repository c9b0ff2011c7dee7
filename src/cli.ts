#!/usr/bin/env node

import { program } from "commander";
import { collect } from "./commands/parse.js";
import { issueCommand } from "./commands/issue.js";
import { keygenCommand } from "./commands/keygen.js";
import { infoCommand, verifyCommand } from "./commands/verify.js";
import { fmt } from "./lib/format.js";

function fail(error: unknown): never {
  console.error(fmt.failure(error instanceof Error ? error.message : String(error)));
  process.exit(1);
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Expected a number, got "${value}"`);
  }
  return parsed;
}

program
  .name("licensekit")
  .description("Issue and verify signed offline licenses")
  .version("0.1.0");

program
  .command("keygen")
  .description("Generate an RSA key pair (private.pem, public.pem)")
  .option("-o, --out-dir <dir>", "Directory to write the keys to", "./keys")
  .option("-b, --bits <number>", "RSA modulus length", parseInteger)
  .action((options: { outDir: string; bits?: number }) => {
    try {
      keygenCommand(options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("issue")
  .description("Sign a new license")
  .option("-k, --private-key <path>", "Private key PEM (default: LICENSE_PRIVATE_KEY_PATH)")
  .requiredOption("-c, --customer <name>", "Customer name")
  .requiredOption("-a, --app-id <id>", "Application identifier")
  .option("-s, --service <id[:name]>", "Licensed service, repeatable", collect, [])
  .option("-l, --limit <name=value>", "Integer usage limit, repeatable", collect, [])
  .option("-f, --feature <name[=bool]>", "Feature flag, repeatable", collect, [])
  .option("-m, --metadata <key=value>", "Metadata entry, repeatable", collect, [])
  .option("-d, --expires-in-days <days>", "Days until expiry (default: never)", parseInteger)
  .option("--license-version <version>", "License version string")
  .option("-e, --environment <env>", "Target environment")
  .option("-o, --out <file>", "Write the license to a file instead of stdout")
  .action((options: {
    privateKey?: string;
    customer: string;
    appId: string;
    service: string[];
    limit: string[];
    feature: string[];
    metadata: string[];
    expiresInDays?: number;
    licenseVersion?: string;
    environment?: string;
    out?: string;
  }) => {
    try {
      issueCommand(options);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("verify <file>")
  .description("Validate a license file")
  .option("-p, --public-key <path>", "Public key PEM (default: LICENSE_PUBLIC_KEY_PATH)")
  .action((file: string, options: { publicKey?: string }) => {
    try {
      const result = verifyCommand(file, options);
      if (!result.valid) process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("info <file>")
  .description("Show license details")
  .option("-p, --public-key <path>", "Public key PEM (default: LICENSE_PUBLIC_KEY_PATH)")
  .action((file: string, options: { publicKey?: string }) => {
    try {
      const { result } = infoCommand(file, options);
      if (!result.valid) process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

program.parse();
