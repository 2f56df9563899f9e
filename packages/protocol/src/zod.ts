import { ZodError } from "zod";
import type { ZodIssue } from "zod";

function stringifyZodIssue(e: ZodIssue) {
  if (e.code === "invalid_type") {
    return `${e.code} - expected ${e.expected} but got ${e.received}`;
  } else if (e.code === "unrecognized_keys") {
    return `${e.code} - found keys ${e.keys.join(", ")}`;
  }

  return `${JSON.stringify(e)}`;
}

export function stringifyZodError(error: unknown): string {
  if (!(error instanceof ZodError)) {
    return error instanceof Error ? error.message : "Unknown error";
  }
  return `${error.errors.length} errors found: ${error.errors.map((e, idx) => `#${idx + 1} - at path \$.${e.path.join(".")} - ${stringifyZodIssue(e)}`).join(", ")}`;
}
