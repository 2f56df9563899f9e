export type FormatterErrorCode =
  | "EmptyInput"
  | "InvalidFormat"
  | "EmptyLocalPart"
  | "EmptyDomain"
  | "EmptyLocalPartAfterNormalization"
  | "NoDigits"
  | "InvalidLength"
  | "InvalidCharacters"
  | "ConsistsSolelyOfPrefix"
  | "ConsistsSolelyOfSuffix";

/**
 * Raised when a value can't be normalized. All formatter errors are caused by the input
 * and won't go away on retry, so callers usually skip the value and move on.
 */
export class FormatterError extends Error {
  public readonly code: FormatterErrorCode;

  constructor(code: FormatterErrorCode, message: string) {
    super(message);
    this.name = "FormatterError";
    this.code = code;
  }
}

export function isFormatterError(e: unknown): e is FormatterError {
  return e instanceof FormatterError;
}
