import { describe, test } from "node:test";
import assert from "assert";
import path from "path";
import { parseValidateOnly, resolveAccounts } from "../src/commands/common";
import { readEnvConfig, untildify } from "../src/lib/config";
import { isTruish, parseBooleanOption } from "../src/lib/util";

describe("resolveAccounts", () => {
  test("parses the operating account", () => {
    assert.deepStrictEqual(resolveAccounts({ operatingAccountType: " google_ads", operatingAccountId: "123" }), {
      operatingAccount: { accountType: "GOOGLE_ADS", accountId: "123" },
    });
  });

  test("adds login and linked accounts", () => {
    assert.deepStrictEqual(
      resolveAccounts({
        operatingAccountType: "DISPLAY_VIDEO_ADVERTISER",
        operatingAccountId: "1",
        loginAccountType: "display_video_partner",
        loginAccountId: "2",
        linkedAccountType: "DATA_PARTNER",
        linkedAccountId: "3",
      }),
      {
        operatingAccount: { accountType: "DISPLAY_VIDEO_ADVERTISER", accountId: "1" },
        loginAccount: { accountType: "DISPLAY_VIDEO_PARTNER", accountId: "2" },
        linkedAccount: { accountType: "DATA_PARTNER", accountId: "3" },
      }
    );
  });

  test("requires both type and ID", () => {
    assert.throws(
      () => resolveAccounts({ operatingAccountType: "GOOGLE_ADS", operatingAccountId: "1", loginAccountType: "GOOGLE_ADS" }),
      { message: "Must specify either both or neither of login account type and login account ID" }
    );
    assert.throws(
      () => resolveAccounts({ operatingAccountType: "GOOGLE_ADS", operatingAccountId: "1", linkedAccountId: "3" }),
      { message: "Must specify either both or neither of linked account type and linked account ID" }
    );
  });

  test("rejects unknown account types", () => {
    assert.throws(() => resolveAccounts({ operatingAccountType: "social", operatingAccountId: "1" }), {
      message:
        "Unknown account type 'social'. Expected one of: GOOGLE_ADS, DISPLAY_VIDEO_PARTNER, DISPLAY_VIDEO_ADVERTISER, DATA_PARTNER",
    });
  });
});

describe("options", () => {
  test("validate-only defaults to true", () => {
    assert.strictEqual(parseValidateOnly(undefined), true);
    assert.strictEqual(parseValidateOnly("true"), true);
    assert.strictEqual(parseValidateOnly("false"), false);
    assert.throws(() => parseValidateOnly("yes"), { message: "--validate-only requires a value of 'true' or 'false'" });
  });

  test("parseBooleanOption", () => {
    assert.strictEqual(parseBooleanOption("--flag", undefined, false), false);
    assert.throws(() => parseBooleanOption("--flag", "TRUE", false), {
      message: "--flag requires a value of 'true' or 'false'",
    });
  });

  test("isTruish", () => {
    assert.strictEqual(isTruish("true"), true);
    assert.strictEqual(isTruish("1"), true);
    assert.strictEqual(isTruish("yes"), false);
    assert.strictEqual(isTruish(undefined), false);
  });
});

describe("config", () => {
  test("reads the endpoint and token", () => {
    const config = readEnvConfig({ PII_INGEST_ENDPOINT: "https://ingest.test/v1", PII_INGEST_ACCESS_TOKEN: "test-token" });
    assert.strictEqual(config.PII_INGEST_ENDPOINT, "https://ingest.test/v1");
    assert.strictEqual(config.PII_INGEST_ACCESS_TOKEN, "test-token");
  });

  test("treats empty values as unset", () => {
    const config = readEnvConfig({ PII_INGEST_ENDPOINT: "", PII_INGEST_ACCESS_TOKEN: "" });
    assert.strictEqual(config.PII_INGEST_ENDPOINT, undefined);
    assert.strictEqual(config.PII_INGEST_ACCESS_TOKEN, undefined);
  });

  test("rejects an invalid endpoint", () => {
    assert.throws(() => readEnvConfig({ PII_INGEST_ENDPOINT: "not a url" }), /^Error: Invalid environment configuration: /);
  });

  test("untildify", () => {
    assert.strictEqual(untildify("/etc/app.env"), "/etc/app.env");
    assert.strictEqual(path.basename(untildify("~/app.env")), "app.env");
    assert.ok(!untildify("~/app.env").startsWith("~"));
  });
});
