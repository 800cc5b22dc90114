/**
 * Vitest Global Setup
 *
 * Keeps configuration tests independent of the developer's shell.
 */
import { beforeEach } from "vitest";

const HELMSMAN_ENV_KEYS = [
  "HELMSMAN_PERMISSION_MODE",
  "HELMSMAN_MAX_TURNS",
  "HELMSMAN_MAX_COST_USD",
  "HELMSMAN_WORKING_DIR",
];

process.setMaxListeners(0);

beforeEach(() => {
  for (const key of HELMSMAN_ENV_KEYS) {
    delete process.env[key];
  }
});
