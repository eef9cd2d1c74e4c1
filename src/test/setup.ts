import { afterEach } from 'vitest';
import { cleanup } from '@testing-library/react';
import '@testing-library/jest-dom/vitest';

// Unmount rendered trees between tests (globals are off, so RTL cannot do it)
afterEach(() => {
  cleanup();
});
