import { chunk } from "lodash";
import type { IngestEventsRequest } from "@pii-ingest/protocol";
import { RpcError } from "@pii-ingest/client";
import { out } from "../log";
import { readEventDataFile } from "../lib/data-file";
import {
  buildDestination,
  buildEvents,
  grantedConsent,
  identifierEncoding,
  MAX_EVENTS_PER_REQUEST,
  toRequestEncoding,
} from "../lib/request";
import { createClient, parseValidateOnly, prettyJson, resolveAccounts } from "./common";
import type { AccountOpts, CommandDeps, CommonOpts } from "./common";

export type EventsOpts = CommonOpts &
  AccountOpts & {
    conversionActionId: string;
    jsonFile: string;
  };

export type EventsDeps = CommandDeps & {
  maxEventsPerRequest?: number;
};

export async function ingestEvents(opts: EventsOpts, deps: EventsDeps = {}) {
  const validateOnly = parseValidateOnly(opts.validateOnly);
  const accounts = resolveAccounts(opts);

  const eventRecords = readEventDataFile(opts.jsonFile);
  const events = buildEvents(eventRecords, identifierEncoding);
  console.log(`Read ${eventRecords.length} records from ${opts.jsonFile}, ${events.length} events to send`);

  const destination = buildDestination({ ...accounts, productDestinationId: opts.conversionActionId });

  const client = deps.client || createClient(opts);
  let requestCount = 0;
  try {
    for (const eventsBatch of chunk(events, deps.maxEventsPerRequest || MAX_EVENTS_PER_REQUEST)) {
      requestCount++;
      const request: IngestEventsRequest = {
        destinations: [destination],
        events: eventsBatch,
        consent: grantedConsent,
        encoding: toRequestEncoding(identifierEncoding),
        validateOnly,
      };
      console.debug(`Request #${requestCount}:\n${prettyJson(request)}`);
      const response = await client.ingestEvents(request);
      out([`Response for request #${requestCount}:`, prettyJson(response)]);
    }
    out(`# of requests sent: ${requestCount}`);
  } catch (e: unknown) {
    if (e instanceof RpcError) {
      throw new Error(`Error sending request #${requestCount}: ${e.message}`, { cause: e });
    }
    throw e;
  } finally {
    client.close();
  }
}
