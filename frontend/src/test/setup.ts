import { afterEach, vi } from "vitest";
import { cleanup } from "@testing-library/react";

// Unmount rendered trees, restore real timers and drop stubbed globals between tests.
afterEach(() => {
  cleanup();
  vi.useRealTimers();
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
