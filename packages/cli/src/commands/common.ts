import { parseAccountType } from "@pii-ingest/protocol";
import type { ProductAccount } from "@pii-ingest/protocol";
import { IngestionServiceClient } from "@pii-ingest/client";
import { configureEnvVars, readEnvConfig } from "../lib/config";
import { parseBooleanOption } from "../lib/util";

/**
 * Options of every command
 */
export type CommonOpts = {
  env?: string[];
  debug?: boolean;
  endpoint?: string;
  validateOnly?: string;
};

export type AccountOpts = {
  operatingAccountType: string;
  operatingAccountId: string;
  loginAccountType?: string;
  loginAccountId?: string;
  linkedAccountType?: string;
  linkedAccountId?: string;
};

export type ResolvedAccounts = {
  operatingAccount: ProductAccount;
  loginAccount?: ProductAccount;
  linkedAccount?: ProductAccount;
};

/**
 * Dependencies that tests replace
 */
export type CommandDeps = {
  client?: IngestionServiceClient;
};

function optionalAccount(kind: "login" | "linked", type?: string, id?: string): ProductAccount | undefined {
  if ((type === undefined) !== (id === undefined)) {
    throw new Error(`Must specify either both or neither of ${kind} account type and ${kind} account ID`);
  }
  if (type === undefined || id === undefined) {
    return undefined;
  }
  return { accountType: parseAccountType(type), accountId: id };
}

export function resolveAccounts(opts: AccountOpts): ResolvedAccounts {
  const accounts: ResolvedAccounts = {
    operatingAccount: { accountType: parseAccountType(opts.operatingAccountType), accountId: opts.operatingAccountId },
  };
  const loginAccount = optionalAccount("login", opts.loginAccountType, opts.loginAccountId);
  if (loginAccount) {
    accounts.loginAccount = loginAccount;
  }
  const linkedAccount = optionalAccount("linked", opts.linkedAccountType, opts.linkedAccountId);
  if (linkedAccount) {
    accounts.linkedAccount = linkedAccount;
  }
  return accounts;
}

// Only validates requests by default.
export function parseValidateOnly(value: string | undefined): boolean {
  return parseBooleanOption("--validate-only", value, true);
}

export function createClient(opts: CommonOpts): IngestionServiceClient {
  configureEnvVars(process.cwd(), opts.env || []);
  const config = readEnvConfig();
  const endpoint = opts.endpoint || config.PII_INGEST_ENDPOINT;
  console.debug(`Using ingestion endpoint ${endpoint || "(default)"}`);
  return new IngestionServiceClient({ endpoint, accessToken: config.PII_INGEST_ACCESS_TOKEN });
}

export function prettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
