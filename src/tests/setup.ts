// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP — Quiet, Deterministic Configuration per Test
// ═══════════════════════════════════════════════════════════════════════════════

import { afterEach, beforeEach } from 'vitest';
import { loadTestConfig, resetConfig } from '../config/index.js';
import { resetLogger } from '../observability/index.js';

beforeEach(() => {
  resetConfig();
  resetLogger();
  loadTestConfig({ logging: { enabled: false } });
});

afterEach(() => {
  resetConfig();
  resetLogger();
});
