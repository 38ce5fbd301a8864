/**
 * Vitest setup file
 * Runs before every test file
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

import { config } from 'dotenv';
import { afterAll } from 'vitest';
import { teardownTest } from './di/test-container.js';

// Load environment variables from .env file (if any)
config();

afterAll(() => {
  teardownTest();
});

// NOTE: Do not register process-level signal handlers in tests.
// Vitest owns the process lifecycle; cleanup happens via the hooks above.
