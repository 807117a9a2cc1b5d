import { vi } from 'vitest';

// Keep stderr diagnostics out of the test output
vi.spyOn(console, 'error').mockImplementation(() => {});
