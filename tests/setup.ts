/**
 * Jest test setup file
 *
 * Runs before all tests to configure the test environment.
 */

// Watcher tests poll real files
jest.setTimeout(30000);

// Keep the engine's own diagnostics out of test output
process.env['LOG_LEVEL'] = process.env['LOG_LEVEL'] ?? 'ERROR';

beforeAll(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});
