/**
 * Jest test setup file
 * Runs before each test file
 */

// Set test environment variables
process.env.NODE_ENV = 'test';

// Keep the developer's shell from leaking into config tests
for (const key of Object.keys(process.env)) {
  if (key.startsWith('HARVEST_')) {
    delete process.env[key];
  }
}

// Add custom matchers if needed
expect.extend({
  toBeIsoTimestamp(received: unknown) {
    const pass =
      typeof received === 'string' &&
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/.test(received) &&
      !Number.isNaN(Date.parse(received));

    if (pass) {
      return {
        message: () => `expected ${String(received)} not to be an ISO-8601 UTC timestamp`,
        pass: true,
      };
    } else {
      return {
        message: () => `expected ${String(received)} to be an ISO-8601 UTC timestamp`,
        pass: false,
      };
    }
  },
});

// Extend Jest matchers types
declare global {
  namespace jest {
    interface Matchers<R> {
      toBeIsoTimestamp(): R;
    }
  }
}

export {};
