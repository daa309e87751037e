/**
 * Test setup shared by all test files
 * Runs before any test file is imported, so config sees the variables below
 *
 * process.env is cleared and reseeded to keep the host environment (e.g. CI)
 * from leaking into tests
 */

const nodeEnvVars = {
  PATH: process.env.PATH,
  HOME: process.env.HOME,
  USER: process.env.USER,
  SHELL: process.env.SHELL,
  TERM: process.env.TERM,
  ...(process.env.NODE_DEBUG ? { NODE_DEBUG: process.env.NODE_DEBUG } : {}),
};

for (const key in process.env) {
  delete process.env[key];
}

for (const [key, value] of Object.entries(nodeEnvVars)) {
  if (value !== undefined) {
    process.env[key] = value;
  }
}

process.env.NODE_ENV = "test";
process.env.AGENT_USER_ID = "test-agent";
