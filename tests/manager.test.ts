/**
 * License manager tests
 */

import * as fs from "fs";
import * as path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { newBuilder } from "../src/lib/builder.js";
import { LicenseError, isLicenseError } from "../src/lib/errors.js";
import { isExpiringSoon, formatTimeUntilExpiry, hasServiceById } from "../src/lib/helpers.js";
import { LicenseManager } from "../src/lib/manager.js";
import {
  DEFAULT_KEY_SIZE,
  LICENSE_EXPIRED,
  LICENSE_NEVER_EXPIRED,
  SIGNING_ALGORITHM,
  type SignedLicense,
} from "../src/lib/types.js";
import { SIGNATURE_FAILED } from "../src/lib/validation.js";
import {
  FIXED_NOW,
  FIXED_NOW_SECONDS,
  TEST_KEY_SIZE,
  fixedClock,
  makeContent,
  makeTempDir,
  removeDir,
  silentLogger,
} from "./fixtures.js";

const DAY_MS = 24 * 60 * 60 * 1000;

let generator: LicenseManager;
let validator: LicenseManager;
let dir: string;

beforeAll(() => {
  generator = new LicenseManager({
    generatorMode: true,
    keySize: TEST_KEY_SIZE,
    clock: fixedClock(),
    logger: silentLogger(),
  });
  validator = new LicenseManager({
    publicKeyPem: generator.exportPublicKey(),
    clock: fixedClock(),
    logger: silentLogger(),
  });
  dir = makeTempDir();
});

afterAll(() => {
  removeDir(dir);
});

function expectKind(fn: () => unknown, kind: LicenseError["kind"]): void {
  try {
    fn();
  } catch (err) {
    expect(isLicenseError(err, kind)).toBe(true);
    return;
  }
  throw new Error(`expected a ${kind} error`);
}

describe("construction", () => {
  it("generates a default-size key pair in generator mode", () => {
    const manager = new LicenseManager({ generatorMode: true, logger: silentLogger() });

    expect(manager.isGeneratorMode()).toBe(true);
    expect(manager.getPublicKey().asymmetricKeyDetails?.modulusLength).toBe(DEFAULT_KEY_SIZE);
  });

  it("builds a validator from a public key alone", () => {
    expect(validator.isGeneratorMode()).toBe(false);
    expect(validator.exportPublicKey()).toBe(generator.exportPublicKey());
  });

  it("fails without any key input", () => {
    expectKind(() => new LicenseManager({ logger: silentLogger() }), "no_public_key");
  });

  it("fails on a malformed public key", () => {
    expectKind(() => new LicenseManager({ publicKeyPem: "garbage", logger: silentLogger() }), "invalid_public_key");
  });

  it("fails on a malformed private key", () => {
    expectKind(
      () => new LicenseManager({ generatorMode: true, privateKeyPem: "garbage", logger: silentLogger() }),
      "invalid_private_key"
    );
  });

  it("rejects a nonsensical key size", () => {
    expectKind(() => new LicenseManager({ generatorMode: true, keySize: 100, logger: silentLogger() }), "invalid_config");
  });

  it("shares the key id of the generator that signs with the matching key", () => {
    expect(validator.getKeyId()).toBe(generator.getKeyId());
  });
});

describe("generate", () => {
  it("wraps signed content in an envelope", () => {
    const license = generator.generate(makeContent());

    expect(license.algorithm).toBe(SIGNING_ALGORITHM);
    expect(license.key_id).toBe(generator.getKeyId());
    expect(license.created_at).toBe(FIXED_NOW_SECONDS);
    expect(license.data).toEqual(makeContent());
    expect(license.signature.length).toBeGreaterThan(0);
  });

  it("stamps issued_at on the copy, leaving the caller's record alone", () => {
    const content = makeContent({ issued_at: 0 });
    const license = generator.generate(content);

    expect(license.data.issued_at).toBe(FIXED_NOW_SECONDS);
    expect(content.issued_at).toBe(0);
  });

  it("keeps an issued_at that is already set", () => {
    expect(generator.generate(makeContent({ issued_at: 42 })).data.issued_at).toBe(42);
  });

  it("requires each of customer, app id and services", () => {
    expectKind(() => generator.generate(makeContent({ customer: "" })), "customer_required");
    expectKind(() => generator.generate(makeContent({ app_id: "" })), "app_id_required");
    expectKind(() => generator.generate(makeContent({ services: [] })), "no_services");
  });

  it("names the missing field", () => {
    let caught: unknown;
    try {
      generator.generate(makeContent({ app_id: "" }));
    } catch (err) {
      caught = err;
    }

    expect(isLicenseError(caught) && caught.context).toEqual({ field: "app_id" });
    expect(caught instanceof Error && caught.message).toBe("application ID is required");
  });

  it("is refused by a validator-only manager", () => {
    expectKind(() => validator.generate(makeContent()), "generator_mode_required");
  });

  it("checks mode before content", () => {
    expectKind(() => validator.generate(makeContent({ customer: "" })), "generator_mode_required");
  });
});

describe("validate", () => {
  it("accepts what the generator produced, in both modes", () => {
    const license = generator.generate(makeContent());

    expect(generator.validate(license)).toEqual({ valid: true, errors: [], warnings: [] });
    expect(validator.validate(license)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects licenses signed by a different key", () => {
    const stranger = new LicenseManager({ generatorMode: true, keySize: TEST_KEY_SIZE, logger: silentLogger() });
    const result = validator.validate(stranger.generate(makeContent()));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([SIGNATURE_FAILED]);
  });

  it("verifies against an overriding public key even in generator mode", () => {
    const other = new LicenseManager({ generatorMode: true, keySize: TEST_KEY_SIZE, logger: silentLogger() });
    const crossed = new LicenseManager({
      generatorMode: true,
      privateKeyPem: generator.exportPrivateKey(),
      publicKeyPem: other.exportPublicKey(),
      logger: silentLogger(),
    });

    expect(crossed.validate(crossed.generate(makeContent())).errors).toEqual([SIGNATURE_FAILED]);
    expect(other.validate(crossed.generate(makeContent())).valid).toBe(false);
    expect(generator.validate(crossed.generate(makeContent())).valid).toBe(true);
  });
});

describe("expiry queries", () => {
  it("distinguishes expired from active content", () => {
    const expired = makeContent({ expires_at: FIXED_NOW_SECONDS - 1 });
    const active = makeContent({ expires_at: FIXED_NOW_SECONDS + 60 });

    expect(generator.isExpired(expired)).toBe(true);
    expect(generator.isActive(expired)).toBe(false);
    expect(generator.isExpired(active)).toBe(false);
    expect(generator.isActive(makeContent())).toBe(true);
  });

  it("raises license_expired from checkExpiration", () => {
    expectKind(() => generator.checkExpiration(makeContent({ expires_at: FIXED_NOW_SECONDS - 1 })), "license_expired");
    expect(() => generator.checkExpiration(makeContent({ expires_at: 0 }))).not.toThrow();
  });
});

describe("getLicenseInfo", () => {
  it("projects content with status and remaining time", () => {
    const content = makeContent({
      expires_at: FIXED_NOW_SECONDS + 2 * 86400 + 3 * 3600,
      limits: { users: 5 },
      features: { backup: true },
      version: "1.0.0",
      environment: "production",
    });

    expect(generator.getLicenseInfo(content)).toEqual({
      customer: "Test Customer",
      appId: "test-app",
      issuedAt: FIXED_NOW,
      expiresAt: new Date((FIXED_NOW_SECONDS + 2 * 86400 + 3 * 3600) * 1000),
      status: "active",
      timeUntilExpiry: "2d 3h",
      services: [{ id: "test-service", name: "Test Service" }],
      limits: { users: 5 },
      features: { backup: true },
      metadata: {},
      version: "1.0.0",
      environment: "production",
    });
  });

  it("reports expired and perpetual licenses", () => {
    const expired = generator.getLicenseInfo(makeContent({ expires_at: FIXED_NOW_SECONDS - 10 }));
    const perpetual = generator.getLicenseInfo(makeContent());

    expect(expired.status).toBe("expired");
    expect(expired.timeUntilExpiry).toBe(LICENSE_EXPIRED);
    expect(perpetual.status).toBe("active");
    expect(perpetual.timeUntilExpiry).toBe(LICENSE_NEVER_EXPIRED);
    expect(perpetual.expiresAt).toBeUndefined();
  });
});

describe("persistence", () => {
  it("saves and loads a license unchanged", () => {
    const license = generator.generate(makeContent({ metadata: { order: "A-1" } }));
    const file = path.join(dir, "saved.json");

    generator.saveLicense(license, file);
    expect(validator.loadLicense(file)).toEqual(license);
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it("loadAndValidate returns the record and its result", () => {
    const license = generator.generate(makeContent());
    const file = path.join(dir, "checked.json");
    generator.saveLicense(license, file);

    expect(validator.loadAndValidate(file)).toEqual({
      license,
      result: { valid: true, errors: [], warnings: [] },
    });
  });

  it("detects a license edited on disk", () => {
    const file = path.join(dir, "edited.json");
    generator.saveLicense(generator.generate(makeContent({ limits: { api_calls: 100 } })), file);

    const onDisk = JSON.parse(fs.readFileSync(file, "utf-8")) as SignedLicense;
    onDisk.data.limits = { api_calls: 1000000 };
    fs.writeFileSync(file, JSON.stringify(onDisk));

    expect(validator.loadAndValidate(file).result.errors).toEqual([SIGNATURE_FAILED]);
  });

  it("reports a missing file as an io error", () => {
    expectKind(() => validator.loadAndValidate(path.join(dir, "absent.json")), "io");
  });

  it("reports a truncated file as a format error", () => {
    const file = path.join(dir, "truncated.json");
    generator.saveLicense(generator.generate(makeContent()), file);
    const raw = fs.readFileSync(file, "utf-8");
    fs.writeFileSync(file, raw.slice(0, Math.floor(raw.length / 2)));

    expectKind(() => validator.loadAndValidate(file), "format");
  });

  it("saves keys that a new manager can load", () => {
    const privatePath = path.join(dir, "keys", "private.pem");
    const publicPath = path.join(dir, "keys", "public.pem");
    generator.saveKeys(privatePath, publicPath);

    const reloaded = new LicenseManager({
      generatorMode: true,
      privateKeyPath: privatePath,
      publicKeyPath: publicPath,
      logger: silentLogger(),
    });

    expect(reloaded.exportPrivateKey()).toBe(generator.exportPrivateKey());
    expect(validator.validate(reloaded.generate(makeContent())).valid).toBe(true);
    expect(fs.statSync(privatePath).mode & 0o777).toBe(0o600);
  });

  it("saves the public key for distribution", () => {
    const file = path.join(dir, "dist-public.pem");
    validator.savePublicKey(file);

    expect(fs.readFileSync(file, "utf-8")).toBe(generator.exportPublicKey());
  });

  it("will not export a private key it does not hold", () => {
    expectKind(() => validator.exportPrivateKey(), "generator_mode_required");
    expectKind(() => validator.exportKeys(), "generator_mode_required");
  });
});

describe("issuing a yearly license", () => {
  it("validates immediately and reports expiry windows", () => {
    const content = newBuilder(fixedClock())
      .withCustomer("Acme Corporation")
      .withAppId("acme-web-app-v1")
      .withService({ id: "web-api", name: "Web API Service" })
      .withLimit("api_calls", 10000)
      .withFeature("analytics", true)
      .withExpirationDuration(365 * DAY_MS)
      .build();

    const license = generator.generate(content);

    expect(validator.validate(license).valid).toBe(true);
    expect(hasServiceById(license.data, "web-api")).toBe(true);
    expect(isExpiringSoon(license.data, 30 * DAY_MS, FIXED_NOW)).toBe(false);
    expect(isExpiringSoon(license.data, 400 * DAY_MS, FIXED_NOW)).toBe(true);
  });

  it("treats a license without expiry as never expiring", () => {
    const license = generator.generate(
      newBuilder(fixedClock()).withCustomer("Acme Corporation").withAppId("acme-web-app-v1").withService({ id: "web-api", name: "Web API" }).build()
    );

    expect(license.data.expires_at).toBeUndefined();
    expect(formatTimeUntilExpiry(license.data.expires_at ?? 0, FIXED_NOW)).toBe(LICENSE_NEVER_EXPIRED);
    expect(isExpiringSoon(license.data, 10000 * DAY_MS, FIXED_NOW)).toBe(false);
  });
});
