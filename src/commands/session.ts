/**
 * Client session shared by the API commands
 */

import { PolarisClient } from '../client/client.js';
import { ConfigManager } from '../config/index.js';
import { Display } from '../display/display.js';
import type { Credentials } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { outputError } from '../utils/output.js';

export interface SessionOptions {
  /** Render tables as HTML fragments instead of text */
  html?: boolean;
  /** Log each HTTP request to stderr */
  trace?: boolean;
}

let globalSessionOptions: SessionOptions = {};

export function setSessionOptions(options: SessionOptions): void {
  globalSessionOptions = { ...globalSessionOptions, ...options };
}

export function getSessionOptions(): SessionOptions {
  return globalSessionOptions;
}

export interface Session {
  client: PolarisClient;
  credentials: Credentials;
}

/**
 * Resolve credentials (config file + environment) and build a client
 * whose display follows the global --html flag
 */
export async function openSession(getConfigPath: () => string): Promise<Session> {
  const manager = new ConfigManager(getConfigPath());
  const credentials = await manager.resolveCredentials();
  const { html, trace } = globalSessionOptions;

  const client = new PolarisClient({
    org: credentials.org,
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    domain: credentials.domain,
    timeoutMs: credentials.timeoutMs,
    trace,
    logger: createLogger(console.error, trace ? 'debug' : 'warn'),
    display: new Display(),
  });
  if (html) {
    client.show().asHtml();
  }
  return { client, credentials };
}

/**
 * Run a command action, reporting any error and setting exit code 1
 */
export async function runAction(failure: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    outputError(failure, error);
    process.exitCode = 1;
  }
}
