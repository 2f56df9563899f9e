import { Command } from "commander";
import { displayVersion } from "../lib/version";
import { ingestAudienceMembers } from "./audience-members";
import { ingestEvents } from "./events";
import type { AudienceMembersOpts } from "./audience-members";
import type { EventsDeps, EventsOpts } from "./events";

const commonOptions = {
  operatingAccountType: {
    flag: "--operating-account-type <account-type>",
    description: "Account type of the operating account: GOOGLE_ADS, DISPLAY_VIDEO_PARTNER, DISPLAY_VIDEO_ADVERTISER or DATA_PARTNER",
  },
  operatingAccountId: {
    flag: "--operating-account-id <account-id>",
    description: "ID of the operating account",
  },
  loginAccountType: {
    flag: "--login-account-type <account-type>",
    description: "Account type of the login account. Must be used together with --login-account-id",
  },
  loginAccountId: {
    flag: "--login-account-id <account-id>",
    description: "ID of the login account",
  },
  linkedAccountType: {
    flag: "--linked-account-type <account-type>",
    description: "Account type of the linked account. Must be used together with --linked-account-id",
  },
  linkedAccountId: {
    flag: "--linked-account-id <account-id>",
    description: "ID of the linked account",
  },
  validateOnly: {
    flag: "--validate-only <true|false>",
    description: "Validate the request without applying it. Default is true",
  },
  endpoint: {
    flag: "--endpoint <url>",
    description: "Base URL of the ingestion API. Can also be set with PII_INGEST_ENDPOINT",
  },
  env: {
    flag: "-e, --env <file...>",
    description:
      "Read environment variables from <file> in addition to .env and .env.local. Supports multiple files by providing multiple --env options",
  },
  debug: {
    flag: "--debug",
    description: "Enable extra logging for debugging purposes",
  },
} as const;

function withCommonOptions(command: Command): Command {
  return command
    .requiredOption(commonOptions.operatingAccountType.flag, commonOptions.operatingAccountType.description)
    .requiredOption(commonOptions.operatingAccountId.flag, commonOptions.operatingAccountId.description)
    .option(commonOptions.loginAccountType.flag, commonOptions.loginAccountType.description)
    .option(commonOptions.loginAccountId.flag, commonOptions.loginAccountId.description)
    .option(commonOptions.linkedAccountType.flag, commonOptions.linkedAccountType.description)
    .option(commonOptions.linkedAccountId.flag, commonOptions.linkedAccountId.description)
    .option(commonOptions.validateOnly.flag, commonOptions.validateOnly.description)
    .option(commonOptions.endpoint.flag, commonOptions.endpoint.description)
    .option(commonOptions.env.flag, commonOptions.env.description)
    .option(commonOptions.debug.flag, commonOptions.debug.description);
}

export function initCli(deps: EventsDeps = {}): Command {
  const program = new Command();
  program
    .name("pii-ingest")
    .description("Normalize, hash and send audience members and conversion events to the ingestion API.");

  withCommonOptions(
    program
      .command("audience-members")
      .description("Send audience members read from a CSV file with email_... and phone_... columns")
      .requiredOption("--audience-id <audience-id>", "ID of the destination audience")
      .requiredOption("--csv-file <path>", "CSV file with member data")
  ).action((opts: AudienceMembersOpts) => ingestAudienceMembers(opts, deps));

  withCommonOptions(
    program
      .command("events")
      .description("Send conversion events read from a JSON file")
      .requiredOption("--conversion-action-id <conversion-action-id>", "ID of the conversion action")
      .requiredOption("--json-file <path>", "JSON file with event data")
  ).action((opts: EventsOpts) => ingestEvents(opts, deps));

  program.helpOption("-h --help", "display help for command");
  program.version(displayVersion, "-v, --version", "output the current version");

  return program;
}
