/**
 * Runs the example patient directory so the bridge has something to talk to.
 *
 * Usage:
 *   npx tsx scripts/example-directory/main.ts
 *
 * Listens on EXAMPLE_DIRECTORY_PORT (default 5010), which matches the
 * bridge's default PATIENT_API_BASE_URL of http://localhost:5010/api.
 */

import { logger } from "../../src/observability/logger.js";
import { createExampleDirectory } from "./app.js";

const port = Number(process.env.EXAMPLE_DIRECTORY_PORT ?? 5010);

createExampleDirectory().listen(port, () => {
  logger.info({ port }, `Example patient directory on http://localhost:${port}/api/Patient`);
});
