import { afterEach, beforeEach, vi } from "vitest";
import { resetAppEnv } from "@/config/ingestionConfig";
import { resetLogConfig } from "@/utils/logger";

// Log configuration and the validated environment are cached per process;
// tests that stub env vars need a fresh read.
beforeEach(() => {
	resetLogConfig();
	resetAppEnv();
});

afterEach(() => {
	vi.useRealTimers();
	vi.unstubAllGlobals();
	vi.unstubAllEnvs();
	vi.restoreAllMocks();
});
