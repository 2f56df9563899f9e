import type { ZodType, ZodTypeDef } from "zod";
import { GoogleAuth } from "google-auth-library";
import {
  IngestAudienceMembersRequest,
  IngestEventsRequest,
  IngestResponse,
  stringifyZodError,
} from "@pii-ingest/protocol";
import { createRpcClient } from "./rpc";
import type { RpcFunc } from "./rpc";

export const defaultEndpoint = "https://datamanager.googleapis.com/v1";
export const ingestionScope = "https://www.googleapis.com/auth/datamanager";

export type AuthHeadersProvider = () => Promise<Record<string, string>>;

export type IngestionServiceClientOptions = {
  endpoint?: string;
  /**
   * If set, sent as a bearer token. Otherwise application default credentials are used
   */
  accessToken?: string;
  auth?: AuthHeadersProvider;
  fetchImpl?: typeof fetch;
};

export function bearerToken(accessToken: string): AuthHeadersProvider {
  return async () => ({ Authorization: `Bearer ${accessToken}` });
}

export function applicationDefaultCredentials(scopes: string[] = [ingestionScope]): AuthHeadersProvider {
  let auth: GoogleAuth | undefined;
  return async () => {
    if (!auth) {
      auth = new GoogleAuth({ scopes });
    }
    const headers = await auth.getRequestHeaders();
    return { ...headers };
  };
}

export class IngestionServiceClient {
  private readonly client: RpcFunc;
  private readonly auth: AuthHeadersProvider;
  private closed = false;

  constructor(opts: IngestionServiceClientOptions = {}) {
    this.client = createRpcClient({
      urlBase: (opts.endpoint || defaultEndpoint).replace(/\/+$/, ""),
      headers: { "Content-Type": "application/json" },
      fetchImpl: opts.fetchImpl,
    });
    this.auth = opts.auth || (opts.accessToken ? bearerToken(opts.accessToken) : applicationDefaultCredentials());
  }

  async ingestAudienceMembers(request: IngestAudienceMembersRequest): Promise<IngestResponse> {
    return this.call("/audienceMembers:ingest", IngestAudienceMembersRequest, request);
  }

  async ingestEvents(request: IngestEventsRequest): Promise<IngestResponse> {
    return this.call("/events:ingest", IngestEventsRequest, request);
  }

  close() {
    this.closed = true;
  }

  private async call<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, request: T): Promise<IngestResponse> {
    if (this.closed) {
      throw new Error("Ingestion client is closed");
    }
    const parsed = schema.safeParse(request);
    if (!parsed.success) {
      throw new Error(`Invalid request to ${path}: ${stringifyZodError(parsed.error)}`);
    }
    console.debug(`Sending request to ${path}`);
    const response = await this.client(path, {
      method: "POST",
      headers: await this.auth(),
      body: parsed.data,
    });
    return IngestResponse.parse(response === "" ? {} : response);
  }
}
