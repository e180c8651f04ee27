import { vi } from 'vitest';

process.on('unhandledRejection', (reason: unknown) => {
  console.error('UNHANDLED_REJECTION', reason);
});

// GLOBAL TEST SANDBOX & NETWORK BLOCKING
const blockMsg = 'NETWORK BLOCKED: Unit tests must not access external resources. Use vi.spyOn() or mocks.';

vi.mock('node:http', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:http')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

vi.mock('node:https', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:https')>();
  return {
    ...actual,
    request: () => { throw new Error(blockMsg); },
    get: () => { throw new Error(blockMsg); }
  };
});

globalThis.fetch = async () => { throw new Error(blockMsg); };
