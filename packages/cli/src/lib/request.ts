import { Encoding, processAddress, processEmailAddress, processPhoneNumber } from "@pii-ingest/formatter";
import { parseEventSource } from "@pii-ingest/protocol";
import type {
  AudienceMember,
  Consent,
  Destination,
  Event,
  ProductAccount,
  RequestEncoding,
  UserIdentifier,
} from "@pii-ingest/protocol";
import type { EventRecord, MemberRow } from "./data-file";

// The maximum number of events allowed per request.
export const MAX_EVENTS_PER_REQUEST = 2000;

export const identifierEncoding = Encoding.Hex;

export const grantedConsent: Consent = {
  adUserData: "CONSENT_GRANTED",
  adPersonalization: "CONSENT_GRANTED",
};

export function toRequestEncoding(encoding: Encoding): RequestEncoding {
  switch (encoding) {
    case Encoding.Hex:
      return "HEX";
    case Encoding.Base64:
      return "BASE64";
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Runs `fn` and returns its result, or logs the error and returns undefined. Invalid
 * identifiers are skipped without failing the whole record
 */
function trySkip<T>(what: string, fn: () => T): T | undefined {
  try {
    return fn();
  } catch (e: unknown) {
    console.warn(`Skipping invalid ${what}: ${errorMessage(e)}`);
    return undefined;
  }
}

function hashIdentifiers(
  emails: string[],
  phoneNumbers: string[],
  encoding: Encoding,
  phoneLabel = "phone"
): UserIdentifier[] {
  const identifiers: UserIdentifier[] = [];
  for (const email of emails) {
    const emailAddress = trySkip("email", () => processEmailAddress(email, encoding));
    if (emailAddress !== undefined) {
      identifiers.push({ emailAddress });
    }
  }
  for (const phone of phoneNumbers) {
    const phoneNumber = trySkip(phoneLabel, () => processPhoneNumber(phone, encoding));
    if (phoneNumber !== undefined) {
      identifiers.push({ phoneNumber });
    }
  }
  return identifiers;
}

export function buildAudienceMembers(rows: MemberRow[], encoding: Encoding = identifierEncoding): AudienceMember[] {
  const members: AudienceMember[] = [];
  for (const row of rows) {
    const userIdentifiers = hashIdentifiers(row.emails, row.phoneNumbers, encoding);
    const rowAddress = row.address;
    if (rowAddress) {
      const address = trySkip("address", () => processAddress(rowAddress, encoding));
      if (address) {
        userIdentifiers.push({ address });
      }
    }
    if (userIdentifiers.length > 0) {
      members.push({ userData: { userIdentifiers } });
    }
  }
  return members;
}

export function buildEvents(records: EventRecord[], encoding: Encoding = identifierEncoding): Event[] {
  const events: Event[] = [];
  for (const record of records) {
    if (!record.timestamp) {
      console.warn("Skipping event with no timestamp.");
      continue;
    }
    const timestamp = new Date(record.timestamp);
    if (isNaN(timestamp.getTime())) {
      console.warn(`Skipping event with invalid timestamp: ${record.timestamp}`);
      continue;
    }
    if (!record.transactionId) {
      console.warn("Skipping event with no transaction ID");
      continue;
    }
    const event: Event = {
      eventTimestamp: timestamp.toISOString(),
      transactionId: record.transactionId,
    };

    if (record.eventSource) {
      try {
        event.eventSource = parseEventSource(record.eventSource);
      } catch (e) {
        console.warn(`Skipping event with invalid event source: ${record.eventSource}`);
        continue;
      }
    }
    if (record.gclid) {
      event.adIdentifiers = { gclid: record.gclid };
    }
    if (record.currency) {
      event.currency = record.currency;
    }
    if (record.value !== undefined && record.value !== null) {
      event.conversionValue = record.value;
    }

    const userIdentifiers = hashIdentifiers(record.emails || [], record.phoneNumbers || [], encoding, "phone number");
    if (userIdentifiers.length > 0) {
      event.userData = { userIdentifiers };
    }
    events.push(event);
  }
  return events;
}

export function buildDestination(opts: {
  operatingAccount: ProductAccount;
  loginAccount?: ProductAccount;
  linkedAccount?: ProductAccount;
  productDestinationId: string;
}): Destination {
  const destination: Destination = {
    operatingAccount: opts.operatingAccount,
    productDestinationId: opts.productDestinationId,
  };
  if (opts.loginAccount) {
    destination.loginAccount = opts.loginAccount;
  }
  if (opts.linkedAccount) {
    destination.linkedAccount = opts.linkedAccount;
  }
  return destination;
}
