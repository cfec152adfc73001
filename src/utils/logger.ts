/**
 * Logger utility that only logs to stdout when not in MCP mode
 * MCP servers use stdio for JSON-RPC communication, so we can't pollute stdout
 */

function stdoutEnabled(): boolean {
  // Check MCP_MODE dynamically each time, not just at import time
  return process.env.MCP_MODE !== 'true';
}

export function log(...args: unknown[]): void {
  if (stdoutEnabled()) {
    console.log(...args);
  }
}

export function debug(...args: unknown[]): void {
  if (stdoutEnabled() && process.env.LOG_LEVEL === 'debug') {
    console.log(...args);
  }
}

// Warnings and errors always go to stderr, which is safe in MCP mode
export function warn(...args: unknown[]): void {
  console.warn(...args);
}

export function error(...args: unknown[]): void {
  console.error(...args);
}
