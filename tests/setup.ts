// Global test setup - runs before all tests.
// Keeps every test on an in-memory database and quiet logs unless a test opts in.

if (!process.env.DATABASE_PATH) {
  process.env.DATABASE_PATH = ':memory:';
}
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
