/**
 * Test setup - runs before each test file.
 * Silences logging unless TEST_VERBOSE=1.
 */

import { setLogLevel } from "./core/logging/logger.js";

if (process.env.TEST_VERBOSE !== "1") {
  setLogLevel("silent");
}
