/**
 * Test Isolation Helpers
 *
 * Provides utilities for better test isolation:
 * - Test context management
 * - Automatic cleanup
 * - Mock factories
 * - Temporary storage
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import type { Logger, PlatformConfig } from 'homebridge';
import { PLATFORM_NAME } from '../../src/settings';

/**
 * Test context for managing test lifecycle
 */
export class TestContext {
  private readonly cleanupCallbacks: Array<() => void | Promise<void>> = [];

  /**
     * Register a cleanup callback
     */
  onCleanup(callback: () => void | Promise<void>): void {
    this.cleanupCallbacks.push(callback);
  }

  /**
     * Create a temporary directory removed on cleanup
     */
  createTempDir(prefix = 'comfort-advisor-'): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
    this.onCleanup(() => fs.rmSync(dir, { recursive: true, force: true }));
    return dir;
  }

  /**
     * Clean up all resources
     */
  async cleanup(): Promise<void> {
    for (const callback of this.cleanupCallbacks.reverse()) {
      await callback();
    }
    this.cleanupCallbacks.length = 0;
  }
}

/**
 * Create a mock logger
 */
export function createMockLogger(): Logger {
  const logger = {
    prefix: 'test',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    log: vi.fn(),
    success: vi.fn(),
  } as unknown as Logger;

  return logger;
}

/**
 * Create a mock platform config
 */
export function createMockConfig(overrides: Partial<PlatformConfig> = {}): PlatformConfig {
  return {
    name: 'Comfort Advisor',
    platform: PLATFORM_NAME,
    temperatureUnit: 'C',
    devices: [],
    ...overrides,
  };
}

/**
 * Create isolated test suite with automatic cleanup
 */
export function describeIsolated(name: string, fn: (getContext: () => TestContext) => void): void {
  describe(name, () => {
    let context: TestContext;

    beforeEach(() => {
      context = new TestContext();
    });

    afterEach(async () => {
      await context.cleanup();
    });

    fn(() => context);
  });
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: { timeout?: number; interval?: number } = {},
): Promise<void> {
  const timeout = options.timeout ?? 2000;
  const interval = options.interval ?? 20;
  const startTime = Date.now();

  while (!(await condition())) {
    if (Date.now() - startTime > timeout) {
      throw new Error('waitFor timeout exceeded');
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }
}
