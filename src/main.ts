#!/usr/bin/env tsx
/**
 * Recommender entrypoint
 *
 * Usage:
 *   npm start -- --programs programs.json --preferences preferences.json --top_n 3
 *
 * Environment variables (optional, .env supported):
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - RECOMMENDER_TOP_N: Default number of recommendations
 */

import "dotenv/config";
import { run } from "@/cli";

process.exitCode = run(process.argv.slice(2));
