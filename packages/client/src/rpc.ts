export function tryJson(res: unknown): unknown {
  if (typeof res === "string") {
    try {
      return JSON.parse(res);
    } catch (e) {
      return res;
    }
  }
  return res;
}

async function parseJsonResponse(result: Response, method: string, url: string): Promise<unknown> {
  const text = await result.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    const reason = e instanceof Error ? `: ${e.message}` : "";
    throw new Error(`Error parsing JSON (len=${text.length}) from ${method} ${url}${reason}`);
  }
}

export type RpcParams<Payload = unknown> = Omit<RequestInit, "method" | "body"> & {
  method?: string;
  body?: Payload;
  /**
   * Replaces the global fetch, mostly for tests
   */
  fetchImpl?: typeof fetch;
};

export interface RpcFunc<Result = unknown, Payload = unknown> {
  (url: string, params?: RpcParams<Payload>): Promise<Result>;
}

function extractString(obj: unknown): string | undefined {
  return typeof obj === "string" ? obj : undefined;
}

function field(obj: unknown, name: string): unknown {
  return typeof obj === "object" && obj !== null ? Reflect.get(obj, name) : undefined;
}

function toRecord(headers: Headers) {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

function headersToRecord(headers: RequestInit["headers"]): Record<string, string> {
  if (!headers) {
    return {};
  }
  return toRecord(new Headers(headers));
}

export function createRpcClient(
  params: Pick<RequestInit, "headers"> & { urlBase?: string; fetchImpl?: typeof fetch }
): RpcFunc {
  return async (url, { headers, ...rest } = {}) => {
    return rpc(params.urlBase ? `${params.urlBase}${url}` : url, {
      fetchImpl: params.fetchImpl,
      ...rest,
      headers: { ...headersToRecord(params.headers), ...headersToRecord(headers) },
    });
  };
}

export class RpcError extends Error {
  public readonly statusCode: number;
  public readonly headers: Record<string, string>;
  public readonly url: string;
  public readonly response: unknown;

  constructor(
    message: string,
    opts: {
      url: string;
      statusCode: number;
      headers: Record<string, string>;
      response: unknown;
    }
  ) {
    super(message);
    this.name = "RpcError";
    this.headers = opts.headers;
    this.statusCode = opts.statusCode;
    this.url = opts.url;
    this.response = tryJson(opts.response);
  }
}

export const rpc: RpcFunc = async (url, { body, fetchImpl = fetch, ...rest } = {}) => {
  const method = rest.method || (body ? "POST" : "GET");
  let result: Response;
  const requestParams: RequestInit = {
    ...rest,
    method: method,
    body: body ? JSON.stringify(body) : undefined,
  };
  try {
    result = await fetchImpl(url, requestParams);
  } catch (e: unknown) {
    throw new RpcError(`Error calling ${method} ${url}${e instanceof Error ? `: ${e.message}` : ""}`, {
      statusCode: -1,
      url,
      headers: {},
      response: undefined,
    });
  }

  const getErrorText = async (result: Response) => {
    try {
      return await result.text();
    } catch (e) {
      return "Unknown error";
    }
  };

  if (!result.ok) {
    const errorText = await getErrorText(result);
    const errorJson = tryJson(errorText);

    //API errors come either as { error: { message } } or as { message }
    const errorMessage =
      extractString(field(field(errorJson, "error"), "message")) ||
      extractString(field(errorJson, "message")) ||
      extractString(field(errorJson, "error")) ||
      `${result.status} ${result.statusText}`;
    throw new RpcError(errorMessage, {
      statusCode: result.status,
      headers: toRecord(result.headers),
      url,
      response: errorText,
    });
  }
  if ((result.headers.get("Content-Type") ?? "").startsWith("application/json")) {
    return await parseJsonResponse(result, method, url);
  } else {
    return await result.text();
  }
};
