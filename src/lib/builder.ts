/**
 * Fluent builder for license content
 *
 * Holds one work-in-progress record; not meant to be shared while building.
 */

import { LicenseError } from "./errors.js";
import { systemClock, toUnixSeconds, type Clock, type LicenseContent, type Service } from "./types.js";

export class LicenseBuilder {
  private readonly content: LicenseContent;

  constructor(private readonly clock: Clock = systemClock) {
    this.content = {
      customer: "",
      app_id: "",
      services: [],
      limits: {},
      features: {},
      issued_at: 0,
      metadata: {},
    };
  }

  withCustomer(customer: string): this {
    this.content.customer = customer;
    return this;
  }

  withAppId(appId: string): this {
    this.content.app_id = appId;
    return this;
  }

  withService(service: Service): this {
    this.content.services.push({ ...service });
    return this;
  }

  /** Replaces any services added so far. */
  withServices(services: Service[]): this {
    this.content.services = services.map((s) => ({ ...s }));
    return this;
  }

  withLimit(name: string, value: number): this {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`limit "${name}" must be an integer (got ${value})`);
    }
    this.content.limits = { ...this.content.limits, [name]: value };
    return this;
  }

  withFeature(name: string, enabled: boolean): this {
    this.content.features = { ...this.content.features, [name]: enabled };
    return this;
  }

  /** Unix seconds; 0 makes the license perpetual. */
  withExpiration(expiresAt: number): this {
    this.content.expires_at = expiresAt;
    return this;
  }

  withExpirationTime(expiresAt: Date): this {
    this.content.expires_at = toUnixSeconds(expiresAt);
    return this;
  }

  withExpirationDuration(durationMs: number): this {
    this.content.expires_at = toUnixSeconds(new Date(this.clock().getTime() + durationMs));
    return this;
  }

  withIssuedAt(issuedAt: number): this {
    this.content.issued_at = issuedAt;
    return this;
  }

  withMetadata(key: string, value: string): this {
    this.content.metadata = { ...this.content.metadata, [key]: value };
    return this;
  }

  withVersion(version: string): this {
    this.content.version = version;
    return this;
  }

  withEnvironment(environment: string): this {
    this.content.environment = environment;
    return this;
  }

  /**
   * Snapshot of the content built so far, with `issued_at` stamped if unset.
   */
  build(): LicenseContent {
    if (this.content.issued_at === 0) {
      this.content.issued_at = toUnixSeconds(this.clock());
    }
    return cloneContent(this.content);
  }

  validate(): void {
    assertGeneratable(this.content);
  }

}

export function newBuilder(clock?: Clock): LicenseBuilder {
  return new LicenseBuilder(clock);
}

/**
 * Throws the content error for the first missing required field.
 */
export function assertGeneratable(content: LicenseContent): void {
  if (!content.customer) {
    throw new LicenseError("customer_required", { context: { field: "customer" } });
  }

  if (!content.app_id) {
    throw new LicenseError("app_id_required", { context: { field: "app_id" } });
  }

  if (content.services.length === 0) {
    throw new LicenseError("no_services", { context: { field: "services" } });
  }
}

export function cloneContent(content: LicenseContent): LicenseContent {
  const copy: LicenseContent = {
    ...content,
    services: content.services.map((s) => ({
      ...s,
      ...(s.metadata ? { metadata: { ...s.metadata } } : {}),
    })),
  };
  if (content.limits) copy.limits = { ...content.limits };
  if (content.features) copy.features = { ...content.features };
  if (content.metadata) copy.metadata = { ...content.metadata };
  return copy;
}
