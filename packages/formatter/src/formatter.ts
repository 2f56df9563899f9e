import crypto from "crypto";
import { FormatterError } from "./errors";

export const Encoding = {
  Hex: "hex",
  Base64: "base64",
} as const;

export type Encoding = (typeof Encoding)[keyof typeof Encoding];

const gmailDomains = ["gmail.com", "googlemail.com"];

const givenNamePrefix = /(?:mr|mrs|ms|dr)\.(?:\s|$)/gi;

const familyNameSuffix = /(?:,\s*|\s+)(?:jr\.|sr\.|2nd|3rd|ii|iii|iv|v|vi|cpa|dc|dds|vm|jd|md|phd)\s?$/i;

// Case mapping touches A-Z only; other characters are kept as they are.
function asciiLowerCase(s: string): string {
  return s.replace(/[A-Z]/g, c => c.toLowerCase());
}

function asciiUpperCase(s: string): string {
  return s.replace(/[a-z]/g, c => c.toUpperCase());
}

/**
 * Lower-cases the address and checks it has the user@domain shape. For Gmail
 * domains, periods in the user part are removed since Gmail ignores them.
 */
export function formatEmailAddress(email: string): string {
  email = email.trim();
  if (email.length === 0) {
    throw new FormatterError("EmptyInput", "Email address is blank or empty.");
  }
  if (/\s/.test(email)) {
    throw new FormatterError("InvalidFormat", "Email address contains intermediate whitespace.");
  }
  const parts = asciiLowerCase(email).split("@");
  if (parts.length !== 2) {
    throw new FormatterError("InvalidFormat", "Email is not of the form user@domain.");
  }
  let [user, domain] = parts;
  if (user.length === 0) {
    throw new FormatterError("EmptyLocalPart", "Email address without the domain is empty.");
  }
  if (domain.length === 0) {
    throw new FormatterError("EmptyDomain", "Domain of email address is empty.");
  }
  if (gmailDomains.includes(domain)) {
    user = user.replace(/\./g, "");
    if (user.length === 0) {
      throw new FormatterError(
        "EmptyLocalPartAfterNormalization",
        "Email address without the domain is empty after normalization."
      );
    }
  }
  return `${user}@${domain}`;
}

/**
 * Keeps the digits only and prefixes them with `+`. Length and country code
 * are not checked.
 */
export function formatPhoneNumber(phone: string): string {
  phone = phone.replace(/ /g, "");
  if (phone.length === 0) {
    throw new FormatterError("EmptyInput", "Phone number is blank or empty.");
  }
  phone = phone.replace(/\D/g, "");
  if (phone.length === 0) {
    throw new FormatterError("NoDigits", "Phone number contains no digits.");
  }
  return `+${phone}`;
}

export function formatRegionCode(regionCode: string): string {
  regionCode = asciiUpperCase(regionCode.trim());
  // length in UTF-8 bytes, so a two-byte letter gets past it and fails on its characters
  if (Buffer.byteLength(regionCode, "utf8") !== 2) {
    throw new FormatterError("InvalidLength", "Region code must be two characters.");
  }
  if (!/^[A-Z]+$/.test(regionCode)) {
    throw new FormatterError("InvalidCharacters", "Region code contains characters other than A-Z.");
  }
  return regionCode;
}

/**
 * Removes honorifics (`Mr.`, `Mrs.`, `Ms.`, `Dr.`) in a single pass. The period is
 * required, so `Mralex` stays as is.
 */
export function formatGivenName(givenName: string): string {
  givenName = asciiLowerCase(givenName.trim());
  if (givenName.length === 0) {
    throw new FormatterError("EmptyInput", "Given name is blank or empty.");
  }
  givenName = givenName.replace(givenNamePrefix, "").trim();
  if (givenName.length === 0) {
    throw new FormatterError("ConsistsSolelyOfPrefix", "Given name consists solely of a prefix.");
  }
  return givenName;
}

/**
 * Strips trailing suffixes (`Jr.`, `DDS`, `III`...) until none is left. A suffix must be
 * separated by a comma or whitespace, so `Boardds` is left alone.
 */
export function formatFamilyName(familyName: string): string {
  familyName = asciiLowerCase(familyName.trim());
  if (familyName.length === 0) {
    throw new FormatterError("EmptyInput", "Family name is blank or empty.");
  }
  while (familyNameSuffix.test(familyName)) {
    familyName = familyName.replace(familyNameSuffix, "");
  }
  if (familyName.length === 0) {
    throw new FormatterError("ConsistsSolelyOfSuffix", "Family name consists solely of a suffix.");
  }
  return familyName;
}

/**
 * Returns the raw SHA-256 digest (32 bytes) of the trimmed string's UTF-8 bytes.
 */
export function hashString(s: string): Buffer {
  s = s.trim();
  if (s.length === 0) {
    throw new FormatterError("EmptyInput", "String is blank or empty.");
  }
  return crypto.createHash("sha256").update(s, "utf8").digest();
}

export function hexEncode(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    throw new FormatterError("EmptyInput", "Bytes empty.");
  }
  return Buffer.from(bytes).toString("hex");
}

export function base64Encode(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    throw new FormatterError("EmptyInput", "Bytes empty.");
  }
  return Buffer.from(bytes).toString("base64");
}

function encode(bytes: Uint8Array, encoding: Encoding): string {
  switch (encoding) {
    case Encoding.Hex:
      return hexEncode(bytes);
    case Encoding.Base64:
      return base64Encode(bytes);
    default: {
      const unknown: never = encoding;
      throw new Error(`Unsupported encoding: ${unknown}`);
    }
  }
}

function hashAndEncode(normalized: string, encoding: Encoding): string {
  return encode(hashString(normalized), encoding);
}

export function processEmailAddress(email: string, encoding: Encoding): string {
  return hashAndEncode(formatEmailAddress(email), encoding);
}

export function processPhoneNumber(phone: string, encoding: Encoding): string {
  return hashAndEncode(formatPhoneNumber(phone), encoding);
}

export function processGivenName(givenName: string, encoding: Encoding): string {
  return hashAndEncode(formatGivenName(givenName), encoding);
}

export function processFamilyName(familyName: string, encoding: Encoding): string {
  return hashAndEncode(formatFamilyName(familyName), encoding);
}

/**
 * Region codes are sent in clear text, so they are only formatted.
 */
export function processRegionCode(regionCode: string): string {
  return formatRegionCode(regionCode);
}

export type Address = {
  givenName: string;
  familyName: string;
  regionCode: string;
  postalCode: string;
};

export function processAddress(address: Address, encoding: Encoding): Address {
  const postalCode = address.postalCode.trim();
  if (postalCode.length === 0) {
    throw new FormatterError("EmptyInput", "Postal code is blank or empty.");
  }
  return {
    givenName: processGivenName(address.givenName, encoding),
    familyName: processFamilyName(address.familyName, encoding),
    regionCode: processRegionCode(address.regionCode),
    postalCode,
  };
}
