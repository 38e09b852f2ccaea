/**
 * Environment and configuration resolution
 */

import { parseSeed } from "./arg.js";

/**
 * Resolve the workload seed
 * Priority: CLI option > WRINKLE_LIST_SEED env var > clock-derived seed
 */
export function resolveSeed(cliSeed?: number): number {
  if (cliSeed !== undefined) {
    return cliSeed;
  }

  const fromEnv = process.env.WRINKLE_LIST_SEED;
  if (fromEnv !== undefined && fromEnv.trim() !== "") {
    return parseSeed(fromEnv, "WRINKLE_LIST_SEED");
  }

  return Date.now() >>> 0;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.WRINKLE_LIST_CLI_DEBUG === "1";
}
