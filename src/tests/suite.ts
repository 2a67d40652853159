/**
 * ============================================================
 *  unlockd — Test Suite
 * ============================================================
 *
 * This file is the single source of truth for all tests.
 * Every test file MUST be imported here to be included in the suite.
 * Tests are grouped by layer, lowest first.
 *
 * Run:            npm test
 *
 * To add a new test file:
 *   1. Create your .test.ts file co-located with the module it tests.
 *   2. Add an import below in the correct section.
 * ============================================================
 */

// ─── Logging ──────────────────────────────────────────────────────────────────
import "../backend/logger.test.js";

// ─── Wire protocol ────────────────────────────────────────────────────────────
import "../backend/modules/ipc/framing.test.js";
import "../backend/modules/ipc/protocol.test.js";
import "../backend/modules/process-channel/arguments.test.js";
import "../backend/modules/process-channel/channel.test.js";

// ─── Schema & native binding ──────────────────────────────────────────────────
import "../backend/modules/key-value/key-value.test.js";
import "../backend/modules/native/native.test.js";
import "../backend/modules/settings/settings.test.js";

// ─── Worker ───────────────────────────────────────────────────────────────────
import "../backend/modules/worker/stats-schema.test.js";
import "../backend/modules/worker/app-manager.test.js";
import "../backend/modules/worker/worker.test.js";

// ─── Catalog ──────────────────────────────────────────────────────────────────
import "../backend/modules/catalog/app-list.test.js";
import "../backend/modules/catalog/catalog.test.js";

// ─── Supervisor ───────────────────────────────────────────────────────────────
import "../backend/modules/supervisor/supervisor.test.js";
import "../backend/modules/supervisor/client.test.js";

// ─── HTTP API ─────────────────────────────────────────────────────────────────
import "../backend/api/api.test.js";
