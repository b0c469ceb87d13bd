import { beforeAll } from "vitest";

// Imported lazily so that test files' vi.mock() calls (e.g. of chalk) apply
// to the logger module, which a static import here would load first
beforeAll(async () => {
  const { logger } = await import("@/lib/logger.js");

  // Engine progress output would drown the reporter
  logger.configure({ level: "silent" });
});
