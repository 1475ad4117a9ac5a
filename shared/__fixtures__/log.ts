import { vi } from "vitest";

/** Stand-in for `context.log`; every level is a spy. */
export function fakeLog() {
  return Object.assign(vi.fn(), {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    verbose: vi.fn()
  });
}
