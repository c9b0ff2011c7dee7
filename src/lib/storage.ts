/**
 * File storage for licenses and keys
 *
 * Whole-file reads and writes. OS failures surface as `io` errors carrying the
 * path; bytes that do not decode as a license surface as `format` errors.
 */

import * as fs from "fs";
import * as path from "path";
import { LicenseError, describeCause } from "./errors.js";
import type { LicenseContent, Service, SignedLicense } from "./types.js";

// Key and license files are owner read/write only
const FILE_MODE = 0o600;

export function readTextFile(filePath: string, what: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new LicenseError("io", {
      message: `failed to read ${what} at ${filePath}: ${describeCause(err)}`,
      context: { path: filePath },
      cause: err,
    });
  }
}

export function writeTextFile(filePath: string, contents: string, what: string): void {
  try {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(filePath, contents, { encoding: "utf-8", mode: FILE_MODE });
    // mode only applies on create; tighten files that already existed
    fs.chmodSync(filePath, FILE_MODE);
  } catch (err) {
    throw new LicenseError("io", {
      message: `failed to write ${what} at ${filePath}: ${describeCause(err)}`,
      context: { path: filePath },
      cause: err,
    });
  }
}

/**
 * Serialize a signed license the way it is stored on disk.
 */
export function encodeSignedLicense(license: SignedLicense): string {
  return JSON.stringify(license, null, 2);
}

/**
 * Parse license file contents. Missing fields decode to zero values so the
 * validator can itemize them; wrongly typed fields are format errors.
 */
export function decodeSignedLicense(raw: string): SignedLicense {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw formatError(describeCause(err), err);
  }

  const root = expectObject(parsed, "license");
  const data = root.data === undefined ? {} : expectObject(root.data, "data");

  const license: SignedLicense = {
    data: decodeContent(data),
    signature: optionalString(root.signature, "signature") ?? "",
    created_at: optionalInteger(root.created_at, "created_at") ?? 0,
  };

  const keyId = optionalString(root.key_id, "key_id");
  if (keyId !== undefined) license.key_id = keyId;

  const algorithm = optionalString(root.algorithm, "algorithm");
  if (algorithm !== undefined) license.algorithm = algorithm;

  return license;
}

function decodeContent(data: Record<string, unknown>): LicenseContent {
  const content: LicenseContent = {
    customer: optionalString(data.customer, "data.customer") ?? "",
    app_id: optionalString(data.app_id, "data.app_id") ?? "",
    services: decodeServices(data.services),
    issued_at: optionalInteger(data.issued_at, "data.issued_at") ?? 0,
  };

  const limits = optionalRecord(data.limits, "data.limits", isInteger, "an integer");
  if (limits) content.limits = limits;

  const features = optionalRecord(data.features, "data.features", isBoolean, "a boolean");
  if (features) content.features = features;

  const expiresAt = optionalInteger(data.expires_at, "data.expires_at");
  if (expiresAt !== undefined) content.expires_at = expiresAt;

  const metadata = optionalRecord(data.metadata, "data.metadata", isString, "a string");
  if (metadata) content.metadata = metadata;

  const version = optionalString(data.version, "data.version");
  if (version !== undefined) content.version = version;

  const environment = optionalString(data.environment, "data.environment");
  if (environment !== undefined) content.environment = environment;

  return content;
}

function decodeServices(value: unknown): Service[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw formatError("data.services must be an array");
  }

  return value.map((item, index) => {
    const field = `data.services[${index}]`;
    const raw = expectObject(item, field);
    const service: Service = {
      id: optionalString(raw.id, `${field}.id`) ?? "",
      name: optionalString(raw.name, `${field}.name`) ?? "",
    };

    const description = optionalString(raw.description, `${field}.description`);
    if (description !== undefined) service.description = description;

    const metadata = optionalRecord(raw.metadata, `${field}.metadata`, isString, "a string");
    if (metadata) service.metadata = metadata;

    return service;
  });
}

// Helpers
function formatError(reason: string, cause?: unknown): LicenseError {
  return new LicenseError("format", {
    message: `failed to decode license: ${reason}`,
    cause,
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

function expectObject(value: unknown, field: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw formatError(`${field} must be an object`);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isString(value)) throw formatError(`${field} must be a string`);
  return value;
}

function optionalInteger(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isInteger(value)) throw formatError(`${field} must be an integer`);
  return value;
}

function optionalRecord<T>(
  value: unknown,
  field: string,
  guard: (entry: unknown) => entry is T,
  expected: string
): Record<string, T> | undefined {
  if (value === undefined || value === null) return undefined;
  const raw = expectObject(value, field);

  const entries: [string, T][] = [];
  for (const [key, entry] of Object.entries(raw)) {
    if (!guard(entry)) {
      throw formatError(`${field}.${key} must be ${expected}`);
    }
    entries.push([key, entry]);
  }
  return Object.fromEntries(entries);
}
