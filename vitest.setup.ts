/**
 * Test setup: keep the shared logger quiet.
 */

import { configureLogger } from './packages/core/src/utils/logger.js';

configureLogger({ enableConsole: false });
