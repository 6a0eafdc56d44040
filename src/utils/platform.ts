/**
 * Terminal and host detection
 */

/**
 * All three standard streams attached to a terminal
 */
export function isInteractiveTTY(): boolean {
  return (
    process.stdin.isTTY === true &&
    process.stdout.isTTY === true &&
    process.stderr.isTTY === true
  );
}

/**
 * Hosts where ora's cursor control garbles output: Windows consoles
 * (CLIXML progress records) and PowerShell on any platform.
 */
export function isSpinnerHostile(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): boolean {
  if (platform === 'win32') {
    return true;
  }
  return Boolean(env.PSModulePath || env.POWERSHELL_DISTRIBUTION_CHANNEL);
}
