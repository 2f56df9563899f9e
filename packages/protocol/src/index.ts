import { z } from "zod";

export * from "./zod";

export const AccountType = z.enum(["GOOGLE_ADS", "DISPLAY_VIDEO_PARTNER", "DISPLAY_VIDEO_ADVERTISER", "DATA_PARTNER"]);

export type AccountType = z.infer<typeof AccountType>;

export const ProductAccount = z.object({
  accountType: AccountType,
  accountId: z.string().min(1),
});

export type ProductAccount = z.infer<typeof ProductAccount>;

export const Destination = z.object({
  operatingAccount: ProductAccount,
  loginAccount: ProductAccount.optional(),
  linkedAccount: ProductAccount.optional(),
  productDestinationId: z.string().min(1),
});

export type Destination = z.infer<typeof Destination>;

/**
 * Names are hashed, region and postal codes are sent as is
 */
export const AddressInfo = z.object({
  givenName: z.string(),
  familyName: z.string(),
  regionCode: z.string().length(2),
  postalCode: z.string(),
});

export type AddressInfo = z.infer<typeof AddressInfo>;

export const UserIdentifier = z.union([
  z.object({ emailAddress: z.string() }).strict(),
  z.object({ phoneNumber: z.string() }).strict(),
  z.object({ address: AddressInfo }).strict(),
]);

export type UserIdentifier = z.infer<typeof UserIdentifier>;

export const UserData = z.object({
  userIdentifiers: z.array(UserIdentifier).min(1),
});

export type UserData = z.infer<typeof UserData>;

export const AudienceMember = z.object({
  userData: UserData,
});

export type AudienceMember = z.infer<typeof AudienceMember>;

export const EventSource = z.enum(["WEB", "APP", "IN_STORE", "PHONE", "OTHER"]);

export type EventSource = z.infer<typeof EventSource>;

export const Event = z.object({
  eventTimestamp: z.string().datetime(),
  transactionId: z.string().min(1),
  eventSource: EventSource.optional(),
  adIdentifiers: z.object({ gclid: z.string() }).optional(),
  currency: z.string().optional(),
  conversionValue: z.number().optional(),
  userData: UserData.optional(),
});

export type Event = z.infer<typeof Event>;

export const ConsentStatus = z.enum(["CONSENT_GRANTED", "CONSENT_DENIED"]);

export type ConsentStatus = z.infer<typeof ConsentStatus>;

export const Consent = z.object({
  adUserData: ConsentStatus,
  adPersonalization: ConsentStatus,
});

export type Consent = z.infer<typeof Consent>;

export const TermsOfService = z.object({
  customerMatchTermsOfServiceStatus: z.enum(["ACCEPTED", "REJECTED"]),
});

export type TermsOfService = z.infer<typeof TermsOfService>;

export const RequestEncoding = z.enum(["HEX", "BASE64"]);

export type RequestEncoding = z.infer<typeof RequestEncoding>;

export const IngestAudienceMembersRequest = z.object({
  destinations: z.array(Destination).min(1),
  audienceMembers: z.array(AudienceMember),
  consent: Consent.optional(),
  termsOfService: TermsOfService.optional(),
  encoding: RequestEncoding,
  validateOnly: z.boolean(),
});

export type IngestAudienceMembersRequest = z.infer<typeof IngestAudienceMembersRequest>;

export const IngestEventsRequest = z.object({
  destinations: z.array(Destination).min(1),
  events: z.array(Event),
  consent: Consent.optional(),
  encoding: RequestEncoding,
  validateOnly: z.boolean(),
});

export type IngestEventsRequest = z.infer<typeof IngestEventsRequest>;

export const IngestResponse = z
  .object({
    requestId: z.string().optional(),
  })
  .passthrough();

export type IngestResponse = z.infer<typeof IngestResponse>;

function parseEnumValue<T extends [string, ...string[]]>(schema: z.ZodEnum<T>, value: string, what: string): T[number] {
  const result = schema.safeParse(value.trim().toUpperCase());
  if (!result.success) {
    throw new Error(`Unknown ${what} '${value}'. Expected one of: ${schema.options.join(", ")}`);
  }
  return result.data;
}

export function parseAccountType(value: string): AccountType {
  return parseEnumValue(AccountType, value, "account type");
}

export function parseEventSource(value: string): EventSource {
  return parseEnumValue(EventSource, value, "event source");
}
