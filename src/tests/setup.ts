// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP — Quiet Logging
// ═══════════════════════════════════════════════════════════════════════════════

import { configureLogger } from '../observability/logging/index.js';

// LOG_LEVEL wins over configureLogger, so services built in tests stay quiet too
process.env.LOG_LEVEL ??= 'fatal';
configureLogger({ pretty: false });
