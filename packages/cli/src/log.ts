import cols from "picocolors";
import { format } from "util";
import { isTruish } from "./lib/util";

type LoggingMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

const severityLevels = ["INFO", "WARN", "ERROR", "DEBUG"] as const;
type SeverityLevel = (typeof severityLevels)[number];
const maxSeverityLevelLength = Math.max(...severityLevels.map(s => s.length));

let debugLoggingEnabled = isTruish(process.env.DEBUG);

export const fmt = cols;

const colors: Record<SeverityLevel, (s: string) => string> = {
  INFO: cols.green,
  WARN: cols.yellow,
  ERROR: cols.red,
  DEBUG: cols.blue,
};

const patched = new WeakSet<Console>();

function prefixConsoleLoggingMethod(severity: SeverityLevel): LoggingMethod {
  return (message?: unknown, ...optionalParams: unknown[]) => {
    if (severity === "DEBUG" && !debugLoggingEnabled) {
      return;
    }
    const timestamp = new Date().toISOString();
    const line = format(`${timestamp} [${severity.padEnd(maxSeverityLevelLength)}]`, message, ...optionalParams);
    const stream = severity === "DEBUG" || severity === "INFO" ? process.stdout : process.stderr;
    stream.write(colors[severity](line) + "\n");
  };
}

export function setEnabledDebugLogging(enabled: boolean) {
  debugLoggingEnabled = enabled;
}

export function initializeConsoleLogging(c: Console = console) {
  if (patched.has(c)) {
    return;
  }

  c.log = prefixConsoleLoggingMethod("INFO");
  c.info = prefixConsoleLoggingMethod("INFO");
  c.warn = prefixConsoleLoggingMethod("WARN");
  c.error = prefixConsoleLoggingMethod("ERROR");
  c.debug = prefixConsoleLoggingMethod("DEBUG");

  patched.add(c);
}

/**
 * Unlike console.* methods, this function should be used to output results
 * of CLI commands
 */
export function out(message?: string | string[]) {
  if (message === undefined) {
    process.stdout.write("\n");
    return;
  }
  if (Array.isArray(message)) {
    message = message.join("\n");
  }
  process.stdout.write(message + "\n");
}
