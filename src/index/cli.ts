import { Command, InvalidArgumentError, Option } from "commander";
import { TagParseError } from "../tagger/errors";
import { API_THROTTLE_SLEEP_MS } from "../tagger/orchestrator";

export const DEFAULT_PROFILE = "default";
export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_MAP_MIGRATED_VALUE = "mig12345";

const TAG_FORMAT_HINT = "Format: --tag key:value or --tag key1:value1,key2:value2";

export interface CliOptions {
  profile: string;
  region: string;
  mapMigrated: string;
  tags: Record<string, string>;
  services: string[];
  throttleMs: number;
}

type RawOptions = {
  profile: string;
  region: string;
  mapMigrated: string;
  tag?: string;
  services?: string;
  throttleMs: number;
};

/**
 * Parses comma separated key:value pairs. Fails on the first pair without a
 * colon, with an empty key or with an empty value.
 */
export function parseCustomTags(tagsStr: string | undefined): Record<string, string> {
  if (!tagsStr) {
    throw new TagParseError(`--tag flag is required. ${TAG_FORMAT_HINT}`);
  }

  const tags: Record<string, string> = {};
  for (const pair of tagsStr.split(",")) {
    const separator = pair.indexOf(":");
    if (separator === -1) {
      throw new TagParseError(
        `invalid tag format: ${pair}. Each tag must be in key:value format`
      );
    }
    const key = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (key === "") {
      throw new TagParseError(`empty key found in tag pair: ${pair}`);
    }
    if (value === "") {
      throw new TagParseError(`empty value found in tag pair: ${pair}`);
    }
    tags[key] = value;
  }
  return tags;
}

function parseThrottle(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return ms;
}

export function buildProgram(): Command {
  return new Command()
    .name("aws-map-tagger")
    .description("Apply MAP 2.0 and custom tags to AWS resources in one region")
    .addOption(
      new Option("-p, --profile <profile>", "AWS profile to use")
        .default(DEFAULT_PROFILE)
        .env("AWS_PROFILE")
    )
    .addOption(
      new Option("-r, --region <region>", "AWS region to use")
        .default(DEFAULT_REGION)
        .env("AWS_REGION")
    )
    .option(
      "--map-migrated <value>",
      "MAP 2.0 value to use",
      DEFAULT_MAP_MIGRATED_VALUE
    )
    .option(
      "-t, --tag <tags>",
      "Custom tags in key:value format (can be comma-separated for multiple tags)"
    )
    .option(
      "-s, --services <names>",
      "Comma-separated services to tag (default: all)"
    )
    .option(
      "--throttle-ms <ms>",
      "Pause after each service to avoid API throttling",
      parseThrottle,
      API_THROTTLE_SLEEP_MS
    );
}

/**
 * Parses user arguments (without the node and script entries).
 * Throws TagParseError when --tag is missing or malformed.
 */
export function parseCliOptions(
  args: string[],
  program: Command = buildProgram()
): CliOptions {
  program.parse(args, { from: "user" });
  const raw = program.opts<RawOptions>();

  return {
    profile: raw.profile,
    region: raw.region,
    mapMigrated: raw.mapMigrated,
    tags: parseCustomTags(raw.tag),
    services: raw.services
      ? raw.services
          .split(",")
          .map((name) => name.trim())
          .filter((name) => name !== "")
      : [],
    throttleMs: raw.throttleMs,
  };
}
