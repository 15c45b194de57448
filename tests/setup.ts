import { afterEach, vi } from 'vitest';

// Environment variables come from vitest.config.ts so they are in place before config/env.ts loads

afterEach(() => {
  vi.useRealTimers();
});
