import type { RunContext } from "../src/tagger/context";
import { buildRunContext } from "../src/tagger/context";
import type { TagSet } from "../src/tagger/tags";
import { createTagSet } from "../src/tagger/tags";

export const TEST_REGION = "us-east-1";
export const TEST_ACCOUNT_ID = "123456789012";

export const testClientConfig = {
  region: TEST_REGION,
  credentials: { accessKeyId: "test", secretAccessKey: "test" },
};

export const DEFAULT_TEST_TAGS = createTagSet("mig12345", { env: "test" });

export function testContext(tags: TagSet = DEFAULT_TEST_TAGS): RunContext {
  return buildRunContext(testClientConfig, TEST_ACCOUNT_ID, tags);
}

/**
 * Stands in for an SDK service exception: same name, $fault and $metadata.
 */
export class FakeServiceError extends Error {
  readonly $fault = "client";
  readonly $metadata = { httpStatusCode: 400 };

  constructor(name: string, message: string = name) {
    super(message);
    this.name = name;
  }
}

/**
 * An error shaped like the one the SDK throws for a cancelled call
 */
export function abortError(): Error {
  const error = new Error("aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Silences console output and exposes the spies for assertions
 */
export function captureConsole() {
  return {
    log: jest.spyOn(console, "log").mockImplementation(() => undefined),
    warn: jest.spyOn(console, "warn").mockImplementation(() => undefined),
    error: jest.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

export const DEFAULT_TEST_TAG_LIST = [
  { Key: "map-migrated", Value: "mig12345" },
  { Key: "env", Value: "test" },
];
