import fs from "fs";
import JSON5 from "json5";
import { parse } from "csv-parse";
import { z } from "zod";
import type { Address } from "@pii-ingest/formatter";
import { stringifyZodError } from "@pii-ingest/protocol";

export type MemberRow = {
  emails: string[];
  phoneNumbers: string[];
  address?: Address;
};

const addressColumns = new Map<string, keyof Address>([
  ["given_name", "givenName"],
  ["family_name", "familyName"],
  ["region_code", "regionCode"],
  ["postal_code", "postalCode"],
]);

const CsvRecords = z.array(z.array(z.string()));

function parseCsv(content: string): Promise<string[][]> {
  return new Promise((resolve, reject) => {
    parse(content, { bom: true, relax_column_count: true, skip_empty_lines: true }, (err, records) => {
      if (err) {
        reject(err);
        return;
      }
      const parsed = CsvRecords.safeParse(records);
      if (parsed.success) {
        resolve(parsed.data);
      } else {
        reject(new Error(`Unexpected CSV records: ${stringifyZodError(parsed.error)}`));
      }
    });
  });
}

function toAddress(fields: Partial<Address>): Address | undefined {
  const { givenName, familyName, regionCode, postalCode } = fields;
  if (givenName && familyName && regionCode && postalCode) {
    return { givenName, familyName, regionCode, postalCode };
  }
  return undefined;
}

/**
 * Reads the member data file. The first row is a header; columns named `email_...` hold email
 * addresses and `phone_...` phone numbers. `given_name`, `family_name`, `region_code` and
 * `postal_code` make up an optional address.
 */
export async function readMemberDataFile(csvFile: string): Promise<MemberRow[]> {
  let content: string;
  try {
    content = fs.readFileSync(csvFile, "utf-8");
  } catch (e) {
    throw new Error(`Could not open CSV file: ${csvFile}`, { cause: e });
  }
  const [header = [], ...rows] = await parseCsv(content);
  const fieldNames = header.map(h => h.trim());

  const members: MemberRow[] = [];
  rows.forEach((row, idx) => {
    const member: MemberRow = { emails: [], phoneNumbers: [] };
    const addressFields: Partial<Address> = {};
    fieldNames.forEach((fieldName, col) => {
      if (fieldName === "") {
        // trailing field without a header
        return;
      }
      const fieldValue = (row[col] ?? "").trim();
      if (fieldValue.length === 0) {
        return;
      }
      const addressField = addressColumns.get(fieldName);
      if (fieldName.startsWith("email_")) {
        member.emails.push(fieldValue);
      } else if (fieldName.startsWith("phone_")) {
        member.phoneNumbers.push(fieldValue);
      } else if (addressField) {
        addressFields[addressField] = fieldValue;
      } else {
        console.warn(`Ignoring unrecognized field: ${fieldName}`);
      }
    });
    const address = toAddress(addressFields);
    if (address) {
      member.address = address;
    }
    if (member.emails.length > 0 || member.phoneNumbers.length > 0 || member.address) {
      members.push(member);
    } else {
      console.warn(`Ignoring line #${idx + 1}. No data.`);
    }
  });
  return members;
}

const optionalString = z.string().nullish();

export const EventRecord = z
  .object({
    timestamp: optionalString,
    transactionId: optionalString,
    eventSource: optionalString,
    gclid: optionalString,
    currency: optionalString,
    value: z.number().nullish(),
    emails: z.array(z.string()).nullish(),
    phoneNumbers: z.array(z.string()).nullish(),
  })
  .passthrough();

export type EventRecord = z.infer<typeof EventRecord>;

/**
 * Reads the event data file, a JSON (or JSON5) array of event records. Records that don't
 * match `EventRecord` are skipped with a warning.
 */
export function readEventDataFile(jsonFile: string): EventRecord[] {
  let content: string;
  try {
    content = fs.readFileSync(jsonFile, "utf-8");
  } catch (e) {
    throw new Error(`Could not read JSON file: ${jsonFile}`, { cause: e });
  }
  let json: unknown;
  try {
    json = JSON5.parse(content);
  } catch (e) {
    throw new Error(`Invalid JSON in file: ${jsonFile}`, { cause: e });
  }
  if (!Array.isArray(json)) {
    throw new Error(`Invalid event data in file ${jsonFile}: expected an array of event records`);
  }
  const records: EventRecord[] = [];
  json.forEach((item: unknown, idx) => {
    const parsed = EventRecord.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      console.warn(`Skipping invalid event record #${idx + 1}: ${stringifyZodError(parsed.error)}`);
    }
  });
  return records;
}
