import { describe, test } from "node:test";
import assert from "assert";
import type { IngestAudienceMembersRequest, IngestEventsRequest } from "@pii-ingest/protocol";
import { IngestionServiceClient, rpc, RpcError } from "../src";

type RecordedCall = {
  url: string;
  method?: string;
  headers: Record<string, string>;
  body?: unknown;
};

function fakeFetch(calls: RecordedCall[], respond: () => Response): typeof fetch {
  return async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    calls.push({
      url: String(input),
      method: init?.method,
      headers,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });
    return respond();
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const destination = {
  operatingAccount: { accountType: "GOOGLE_ADS" as const, accountId: "1234567890" },
  productDestinationId: "4321",
};

const audienceRequest: IngestAudienceMembersRequest = {
  destinations: [destination],
  audienceMembers: [{ userData: { userIdentifiers: [{ emailAddress: "509e93" }] } }],
  consent: { adUserData: "CONSENT_GRANTED", adPersonalization: "CONSENT_GRANTED" },
  termsOfService: { customerMatchTermsOfServiceStatus: "ACCEPTED" },
  encoding: "HEX",
  validateOnly: true,
};

describe("IngestionServiceClient", () => {
  test("posts audience members with a bearer token", async () => {
    const calls: RecordedCall[] = [];
    const client = new IngestionServiceClient({
      endpoint: "https://ingest.test/v1/",
      accessToken: "test-token",
      fetchImpl: fakeFetch(calls, () => jsonResponse({ requestId: "req-1" })),
    });
    const response = await client.ingestAudienceMembers(audienceRequest);

    assert.deepStrictEqual(response, { requestId: "req-1" });
    assert.strictEqual(calls.length, 1);
    assert.strictEqual(calls[0].url, "https://ingest.test/v1/audienceMembers:ingest");
    assert.strictEqual(calls[0].method, "POST");
    assert.strictEqual(calls[0].headers["authorization"], "Bearer test-token");
    assert.strictEqual(calls[0].headers["content-type"], "application/json");
    assert.deepStrictEqual(calls[0].body, audienceRequest);
  });

  test("posts events using the auth provider", async () => {
    const calls: RecordedCall[] = [];
    const client = new IngestionServiceClient({
      endpoint: "https://ingest.test/v1",
      auth: async () => ({ Authorization: "Bearer from-provider" }),
      fetchImpl: fakeFetch(calls, () => jsonResponse({})),
    });
    const request: IngestEventsRequest = {
      destinations: [destination],
      events: [{ eventTimestamp: "2025-03-01T10:00:00.000Z", transactionId: "t-1" }],
      encoding: "HEX",
      validateOnly: false,
    };
    const response = await client.ingestEvents(request);

    assert.deepStrictEqual(response, {});
    assert.strictEqual(calls[0].url, "https://ingest.test/v1/events:ingest");
    assert.strictEqual(calls[0].headers["authorization"], "Bearer from-provider");
  });

  test("rejects invalid requests before sending", async () => {
    const calls: RecordedCall[] = [];
    const client = new IngestionServiceClient({
      accessToken: "test-token",
      fetchImpl: fakeFetch(calls, () => jsonResponse({})),
    });
    await assert.rejects(client.ingestAudienceMembers({ ...audienceRequest, destinations: [] }), {
      message: /^Invalid request to \/audienceMembers:ingest: 1 errors found: #1 - at path \$\.destinations/,
    });
    assert.strictEqual(calls.length, 0);
  });

  test("reports API errors as RpcError", async () => {
    const client = new IngestionServiceClient({
      accessToken: "test-token",
      fetchImpl: fakeFetch([], () => jsonResponse({ error: { code: 400, message: "Invalid operating account" } }, 400)),
    });
    await assert.rejects(client.ingestAudienceMembers(audienceRequest), e => {
      assert.ok(e instanceof RpcError);
      assert.strictEqual(e.message, "Invalid operating account");
      assert.strictEqual(e.statusCode, 400);
      assert.strictEqual(e.url, "https://datamanager.googleapis.com/v1/audienceMembers:ingest");
      return true;
    });
  });

  test("can't be used after close", async () => {
    const client = new IngestionServiceClient({
      accessToken: "test-token",
      fetchImpl: fakeFetch([], () => jsonResponse({})),
    });
    client.close();
    await assert.rejects(client.ingestAudienceMembers(audienceRequest), { message: "Ingestion client is closed" });
  });
});

describe("rpc", () => {
  test("returns text for non-JSON responses", async () => {
    const result = await rpc("https://rpc.test/ping", {
      fetchImpl: fakeFetch([], () => new Response("pong", { status: 200 })),
    });
    assert.strictEqual(result, "pong");
  });

  test("falls back to the status line", async () => {
    await assert.rejects(
      rpc("https://rpc.test/fail", {
        fetchImpl: fakeFetch([], () => new Response("oops", { status: 503, statusText: "Service Unavailable" })),
      }),
      { name: "RpcError", message: "503 Service Unavailable", statusCode: 503, response: "oops" }
    );
  });

  test("wraps transport failures", async () => {
    const failingFetch: typeof fetch = async () => {
      throw new Error("connection refused");
    };
    await assert.rejects(rpc("https://rpc.test/down", { fetchImpl: failingFetch }), {
      message: "Error calling GET https://rpc.test/down: connection refused",
      statusCode: -1,
    });
  });
});
