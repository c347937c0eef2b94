// Runs before every test file (vitest setupFiles), before the logger is imported.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
