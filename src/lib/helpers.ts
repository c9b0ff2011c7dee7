/**
 * Convenience checks over license content
 */

import {
  LICENSE_EXPIRED,
  LICENSE_NEVER_EXPIRED,
  STATUS_ACTIVE,
  STATUS_EXPIRED,
  toUnixSeconds,
  type LicenseContent,
  type LicenseStatus,
} from "./types.js";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * True if any service matches by id or by name. Exact, case-sensitive.
 */
export function hasService(content: LicenseContent, identifier: string): boolean {
  return content.services.some((s) => s.id === identifier || s.name === identifier);
}

export function hasServiceById(content: LicenseContent, serviceId: string): boolean {
  return content.services.some((s) => s.id === serviceId);
}

export function hasServiceByName(content: LicenseContent, serviceName: string): boolean {
  return content.services.some((s) => s.name === serviceName);
}

/** Disabled and absent features both read as false. */
export function hasFeature(content: LicenseContent, feature: string): boolean {
  return content.features?.[feature] === true;
}

export function getLimit(content: LicenseContent, name: string): number | undefined {
  return content.limits?.[name];
}

/**
 * Check if the license expires within `withinMs` from now
 */
export function isExpiringSoon(content: LicenseContent, withinMs: number, now: Date = new Date()): boolean {
  const expiresAt = content.expires_at ?? 0;
  if (expiresAt === 0) return false;

  return expiresAt * 1000 - now.getTime() <= withinMs;
}

/**
 * Milliseconds until `expiresAt` (unix seconds); 0 when perpetual or already past
 */
export function calculateRemainingTime(expiresAt: number, now: Date = new Date()): number {
  if (expiresAt === 0) return 0;

  const remaining = expiresAt * 1000 - now.getTime();
  return remaining < 0 ? 0 : remaining;
}

export function formatTimeUntilExpiry(expiresAt: number, now: Date = new Date()): string {
  if (expiresAt === 0) return LICENSE_NEVER_EXPIRED;

  const remaining = calculateRemainingTime(expiresAt, now);
  if (remaining === 0) return LICENSE_EXPIRED;

  return formatDuration(remaining);
}

/**
 * e.g. "2024-05-01 12:00:00 UTC"
 */
export function formatExpiry(expiresAt: number): string {
  if (expiresAt === 0) return LICENSE_NEVER_EXPIRED;

  const iso = new Date(expiresAt * 1000).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

export function getLicenseStatus(content: LicenseContent, now: Date = new Date()): LicenseStatus {
  const expiresAt = content.expires_at ?? 0;
  if (expiresAt === 0) return STATUS_ACTIVE;

  return toUnixSeconds(now) > expiresAt ? STATUS_EXPIRED : STATUS_ACTIVE;
}

/**
 * "3d 4h 5m" with zero parts left out
 */
export function formatDuration(ms: number): string {
  if (ms < 0) return LICENSE_EXPIRED;

  const days = Math.floor(ms / DAY_MS);
  const hours = Math.floor(ms / HOUR_MS) % 24;
  const minutes = Math.floor(ms / MINUTE_MS) % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);

  return parts.length === 0 ? "Less than 1 minute" : parts.join(" ");
}
