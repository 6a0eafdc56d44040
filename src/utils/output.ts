/**
 * Output utilities for CLI
 */

export interface OutputOptions {
  /** Print machine-readable JSON instead of tables */
  json?: boolean;
  /** Include stack traces with errors */
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

/**
 * Print `data` as JSON in --json mode, otherwise the human-readable text
 */
export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

export function outputError(message: string, error?: unknown): void {
  const details = error instanceof Error ? error.message : error === undefined ? undefined : String(error);
  if (globalOptions.json) {
    console.error(JSON.stringify({ error: message, details }));
    return;
  }
  console.error(`Error: ${message}`);
  if (globalOptions.verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (globalOptions.json) {
    const result: { success: boolean; message: string; data?: unknown } = { success: true, message };
    if (data !== undefined) {
      result.data = data;
    }
    console.log(JSON.stringify(result));
  } else {
    console.log(`✓ ${message}`);
  }
}

/**
 * Mask sensitive values for display
 */
export function maskSecret(value: string, showChars: number = 4): string {
  if (value.length <= showChars * 2) {
    return '****';
  }
  return value.slice(0, showChars) + '****' + value.slice(-showChars);
}
