import {
  GetBucketTaggingCommand,
  ListBucketsCommand,
  PutBucketTaggingCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { mockClient } from "aws-sdk-client-mock";
import { mergeBucketTags, s3Tagger } from "../../src/services/s3";
import { runServicePass } from "../../src/tagger/pipeline";
import { DEFAULT_TEST_TAG_LIST, FakeServiceError, captureConsole, testContext } from "../utils";

const s3Mock = mockClient(S3Client);

describe("mergeBucketTags", () => {
  test("keeps existing tags, overrides shared keys and drops aws: keys", () => {
    expect(
      mergeBucketTags(
        [
          { Key: "owner", Value: "data" },
          { Key: "aws:cloudformation:stack-name", Value: "storage" },
          { Key: "env", Value: "old" },
        ],
        DEFAULT_TEST_TAG_LIST
      )
    ).toEqual([
      { Key: "owner", Value: "data" },
      { Key: "env", Value: "test" },
      { Key: "map-migrated", Value: "mig12345" },
    ]);
  });
});

describe("S3 tagger", () => {
  beforeEach(() => {
    s3Mock.reset();
    s3Mock.on(ListBucketsCommand).resolves({ Buckets: [{ Name: "logs" }, { Name: "assets" }] });
    s3Mock
      .on(GetBucketTaggingCommand, { Bucket: "assets" })
      .rejects(new FakeServiceError("NoSuchTagSet", "The TagSet does not exist"));
    s3Mock.on(PutBucketTaggingCommand).resolves({});
  });

  test("writes the merged tag set of every bucket", async () => {
    captureConsole();
    s3Mock
      .on(GetBucketTaggingCommand, { Bucket: "logs" })
      .resolves({ TagSet: [{ Key: "owner", Value: "data" }] });

    const report = await runServicePass(s3Tagger, testContext());

    expect(
      s3Mock.commandCalls(PutBucketTaggingCommand).map((call) => call.args[0].input)
    ).toEqual([
      {
        Bucket: "logs",
        Tagging: {
          TagSet: [{ Key: "owner", Value: "data" }, ...DEFAULT_TEST_TAG_LIST],
        },
      },
      { Bucket: "assets", Tagging: { TagSet: DEFAULT_TEST_TAG_LIST } },
    ]);
    expect(report.metricsFor("bucket").summary()).toBe("Found: 2, Tagged: 2, Failed: 0");
  });

  test("fails the bucket when its tags cannot be read", async () => {
    const output = captureConsole();
    s3Mock
      .on(GetBucketTaggingCommand, { Bucket: "logs" })
      .rejects(new FakeServiceError("AccessDenied"));

    const report = await runServicePass(s3Tagger, testContext());

    expect(s3Mock.commandCalls(PutBucketTaggingCommand)).toHaveLength(1);
    expect(report.metricsFor("bucket").summary()).toBe("Found: 2, Tagged: 1, Failed: 1");
    expect(output.warn).toHaveBeenCalledWith("Access denied while tagging S3 bucket resource logs");
  });
});
