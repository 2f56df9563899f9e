export function isTruish(x: unknown): boolean {
  return x === "true" || x === "1";
}

/**
 * Parses a `true` / `false` option value. Anything else is an error
 */
export function parseBooleanOption(name: string, value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }
  if (value !== "true" && value !== "false") {
    throw new Error(`${name} requires a value of 'true' or 'false'`);
  }
  return value === "true";
}
