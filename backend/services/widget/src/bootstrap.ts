// backend/services/widget/src/bootstrap.ts
/**
 * Load .env before anything reads configuration. Imported first by index.ts.
 * Variables already set in the environment win over the file.
 */

import { config as loadEnv } from "dotenv";

loadEnv({ path: process.env.ENV_FILE || ".env" });
