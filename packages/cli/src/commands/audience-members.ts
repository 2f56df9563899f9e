import type { IngestAudienceMembersRequest } from "@pii-ingest/protocol";
import { RpcError } from "@pii-ingest/client";
import { out } from "../log";
import { readMemberDataFile } from "../lib/data-file";
import {
  buildAudienceMembers,
  buildDestination,
  grantedConsent,
  identifierEncoding,
  toRequestEncoding,
} from "../lib/request";
import { createClient, parseValidateOnly, prettyJson, resolveAccounts } from "./common";
import type { AccountOpts, CommandDeps, CommonOpts } from "./common";

export type AudienceMembersOpts = CommonOpts &
  AccountOpts & {
    audienceId: string;
    csvFile: string;
  };

export async function ingestAudienceMembers(opts: AudienceMembersOpts, deps: CommandDeps = {}) {
  const validateOnly = parseValidateOnly(opts.validateOnly);
  const accounts = resolveAccounts(opts);

  const memberRows = await readMemberDataFile(opts.csvFile);
  const audienceMembers = buildAudienceMembers(memberRows, identifierEncoding);
  console.log(`Read ${memberRows.length} rows from ${opts.csvFile}, ${audienceMembers.length} members to send`);

  const request: IngestAudienceMembersRequest = {
    destinations: [buildDestination({ ...accounts, productDestinationId: opts.audienceId })],
    audienceMembers,
    consent: grantedConsent,
    termsOfService: { customerMatchTermsOfServiceStatus: "ACCEPTED" },
    encoding: toRequestEncoding(identifierEncoding),
    validateOnly,
  };

  const client = deps.client || createClient(opts);
  try {
    const response = await client.ingestAudienceMembers(request);
    out(["Response:", prettyJson(response)]);
  } catch (e: unknown) {
    if (e instanceof RpcError) {
      throw new Error(`Error sending request: ${e.message}`, { cause: e });
    }
    throw e;
  } finally {
    client.close();
  }
}
