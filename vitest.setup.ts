/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so that
 * vi.stubEnv() calls made in a test are picked up by getConfig(),
 * and detaches any telemetry sink a previous test installed.
 */

import { beforeAll, beforeEach, afterEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";
import { setTestSink } from "./src/utils/telemetry.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});

afterEach(() => {
  setTestSink(null);
});
