/**
 * Shared test fixtures
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import type { LicenseLogger } from "../src/lib/config.js";
import type { LicenseContent } from "../src/lib/types.js";

// Small keys keep the suite fast
export const TEST_KEY_SIZE = 1024;

// 2025-01-01T00:00:00Z
export const FIXED_NOW = new Date("2025-01-01T00:00:00Z");
export const FIXED_NOW_SECONDS = 1735689600;

export function fixedClock(date: Date = FIXED_NOW): () => Date {
  return () => new Date(date.getTime());
}

export function silentLogger(): LicenseLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
}

export function makeContent(overrides?: Partial<LicenseContent>): LicenseContent {
  return {
    customer: "Test Customer",
    app_id: "test-app",
    services: [{ id: "test-service", name: "Test Service" }],
    issued_at: FIXED_NOW_SECONDS,
    ...overrides,
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "licensekit-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
