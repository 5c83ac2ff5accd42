/**
 * Runtime environment detection utilities
 */

/**
 * Detects if the application is running under PM2
 * PM2 sets environment variables like pm_id, NODE_APP_INSTANCE, and PM2_HOME
 */
export function isRunningUnderPm2(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.pm_id || env.NODE_APP_INSTANCE || env.PM2_HOME);
}

/**
 * Determines if the interactive CLI should be attached
 * @returns true if CLI should be attached, false otherwise
 */
export function shouldAttachCli(env: NodeJS.ProcessEnv = process.env, isTTY: boolean = Boolean(process.stdin.isTTY)): boolean {
  // Explicit override via environment variable
  if (env.DISABLE_CLI === "true") {
    return false;
  }

  // Don't attach CLI when running under PM2
  if (isRunningUnderPm2(env)) {
    return false;
  }

  // Only attach CLI in interactive terminals
  return isTTY;
}
