/**
 * Vitest Setup File
 *
 * Global test setup and mocks.
 */

import { vi } from 'vitest';

// Placeholder credentials so config loading never reaches for real ones
process.env.OPENAI_API_KEY = 'test-openai-key';
delete process.env.REDIS_URL;

// Keep script-style console output out of the test report
// Comment these out when debugging tests
vi.spyOn(console, 'warn').mockImplementation(() => {});
vi.spyOn(console, 'log').mockImplementation(() => {});
