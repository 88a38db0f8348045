import { beforeEach, afterEach } from 'vitest';
import { vol } from 'memfs';

export const TEST_HOME = '/test-home';

beforeEach(() => {
  // Reset virtual filesystem before each test
  vol.reset();
});

afterEach(() => {
  vol.reset();
});
