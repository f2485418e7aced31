import type {
  ListedResource,
  Page,
  ResourceTypePass,
  ServiceTagger,
} from "../../src/tagger/pipeline";
import { defineResourceType, runServicePass } from "../../src/tagger/pipeline";
import type { KeyValueTag } from "../../src/tagger/tags";
import { STANDARD_TAG_LIMITS, createTagSet, toTagList } from "../../src/tagger/tags";
import { FakeServiceError, captureConsole, testContext } from "../utils";

interface FakeType {
  pass: ResourceTypePass;
  listed: (string | undefined)[];
  applied: { identifier: string; tags: KeyValueTag[] }[];
}

/**
 * A resource type over in-memory pages; page i is requested with token "i".
 */
function fakeType(
  label: string,
  pages: Page<ListedResource>[],
  options: {
    failures?: Record<string, unknown>;
    exclude?: (item: ListedResource) => boolean;
    children?: (item: ListedResource) => ResourceTypePass[];
    onApply?: (identifier: string) => void;
  } = {}
): FakeType {
  const listed: (string | undefined)[] = [];
  const applied: { identifier: string; tags: KeyValueTag[] }[] = [];

  const pass = defineResourceType({
    label,
    list: async (nextToken) => {
      listed.push(nextToken);
      return pages[nextToken ? Number(nextToken) : 0];
    },
    exclude: options.exclude,
    identify: (item) => `id-${item.name}`,
    convertTags: toTagList,
    apply: async (identifier, tags) => {
      options.onApply?.(identifier);
      const failure = options.failures?.[identifier];
      if (failure !== undefined) {
        throw failure;
      }
      applied.push({ identifier, tags });
    },
    children: options.children,
  });

  return { pass, listed, applied };
}

function fakeService(name: string, passes: ResourceTypePass[]): ServiceTagger {
  return { name, resourceTypes: () => passes };
}

describe("defineResourceType", () => {
  test("walks every page once and tags every item", async () => {
    captureConsole();
    const widgets = fakeType("widget", [
      { items: [{ name: "a" }, { name: "b" }], nextToken: "1" },
      { items: [{ name: "c" }], nextToken: "2" },
      { items: [] },
    ]);

    const report = await runServicePass(fakeService("Fake", [widgets.pass]), testContext());

    expect(widgets.listed).toEqual([undefined, "1", "2"]);
    expect(widgets.applied.map((call) => call.identifier)).toEqual([
      "id-a",
      "id-b",
      "id-c",
    ]);
    expect(widgets.applied[0].tags).toEqual([
      { Key: "map-migrated", Value: "mig12345" },
      { Key: "env", Value: "test" },
    ]);
    expect(report.metricsFor("widget").summary()).toBe("Found: 3, Tagged: 3, Failed: 0");
  });

  test("carries on past a failed resource", async () => {
    const output = captureConsole();
    const instances = fakeType(
      "DB instance",
      [{ items: [{ name: "db-1" }, { name: "db-2" }] }],
      { failures: { "id-db-1": new FakeServiceError("AccessDenied") } }
    );

    const report = await runServicePass(
      fakeService("RDS", [instances.pass]),
      testContext()
    );

    const metrics = report.metricsFor("DB instance");
    expect([metrics.found, metrics.tagged, metrics.failed]).toEqual([2, 1, 1]);
    expect(instances.applied.map((call) => call.identifier)).toEqual(["id-db-2"]);
    expect(output.warn).toHaveBeenCalledWith(
      "Access denied while tagging RDS DB instance resource id-db-1"
    );
    expect(output.log).toHaveBeenCalledWith("Successfully tagged RDS DB instance: db-2");
  });

  test("skips excluded items without counting them", async () => {
    const output = captureConsole();
    const workgroups = fakeType(
      "workgroup",
      [{ items: [{ name: "primary" }, { name: "etl" }] }],
      { exclude: (item) => item.name === "primary" }
    );

    const report = await runServicePass(
      fakeService("Athena", [workgroups.pass]),
      testContext()
    );

    expect(workgroups.applied.map((call) => call.identifier)).toEqual(["id-etl"]);
    expect(report.metricsFor("workgroup").summary()).toBe("Found: 1, Tagged: 1, Failed: 0");
    expect(output.log).toHaveBeenCalledWith("Skipping Athena workgroup: primary");
  });

  test("ends the pass on a listing error and moves to the next type", async () => {
    const output = captureConsole();
    const broken = defineResourceType({
      label: "crawler",
      list: async () => {
        throw new Error("listing failed");
      },
      identify: (item: ListedResource) => item.name,
      convertTags: toTagList,
      apply: async () => undefined,
    });
    const jobs = fakeType("job", [{ items: [{ name: "nightly" }] }]);

    const report = await runServicePass(
      fakeService("Glue", [broken, jobs.pass]),
      testContext()
    );

    expect(output.error).toHaveBeenCalledWith(
      "Error listing Glue crawler resources: listing failed"
    );
    expect(report.metricsFor("crawler").found).toBe(0);
    expect(report.metricsFor("job").tagged).toBe(1);
  });

  test("tags children of every parent, even one that failed", async () => {
    captureConsole();
    const children: FakeType[] = [];
    const parents = fakeType(
      "load balancer",
      [{ items: [{ name: "lb-1" }, { name: "lb-2" }] }],
      {
        failures: { "id-lb-1": new Error("conflict") },
        children: (lb) => {
          const child = fakeType("target group", [{ items: [{ name: `${lb.name}-tg` }] }]);
          children.push(child);
          return [child.pass];
        },
      }
    );

    const report = await runServicePass(
      fakeService("ELBv2", [parents.pass]),
      testContext()
    );

    expect(children.flatMap((child) => child.applied.map((call) => call.identifier))).toEqual([
      "id-lb-1-tg",
      "id-lb-2-tg",
    ]);
    expect(report.resourceTypes.map((metrics) => metrics.label)).toEqual([
      "load balancer",
      "target group",
    ]);
    expect(report.metricsFor("load balancer").summary()).toBe(
      "Found: 2, Tagged: 1, Failed: 1"
    );
    expect(report.metricsFor("target group").summary()).toBe(
      "Found: 2, Tagged: 2, Failed: 0"
    );
  });

  test("stops at the next item once aborted", async () => {
    captureConsole();
    const controller = new AbortController();
    const volumes = fakeType(
      "EBS volume",
      [{ items: [{ name: "vol-1" }, { name: "vol-2" }] }],
      { onApply: () => controller.abort() }
    );

    await expect(
      runServicePass(fakeService("EC2", [volumes.pass]), testContext(), controller.signal)
    ).rejects.toThrow("This operation was aborted");
    expect(volumes.applied.map((call) => call.identifier)).toEqual(["id-vol-1"]);
  });

  test("fetches no further page once aborted", async () => {
    captureConsole();
    const controller = new AbortController();
    const instances = fakeType(
      "instance",
      [{ items: [{ name: "i-1" }, { name: "i-2" }], nextToken: "1" }, { items: [{ name: "i-3" }] }],
      {
        onApply: (identifier) => {
          if (identifier === "id-i-2") {
            controller.abort();
          }
        },
      }
    );

    await expect(
      runServicePass(fakeService("EC2", [instances.pass]), testContext(), controller.signal)
    ).rejects.toThrow("This operation was aborted");
    expect(instances.listed).toEqual([undefined]);
    expect(instances.applied.map((call) => call.identifier)).toEqual(["id-i-1", "id-i-2"]);
  });
});

describe("runServicePass", () => {
  test("logs per-type and total summaries", async () => {
    const output = captureConsole();
    const instances = fakeType("instance", [{ items: [{ name: "i-1" }] }]);
    const volumes = fakeType("EBS volume", [{ items: [{ name: "vol-1" }] }], {
      failures: { "id-vol-1": new FakeServiceError("ThrottlingException") },
    });

    await runServicePass(fakeService("EC2", [instances.pass, volumes.pass]), testContext());

    expect(output.log).toHaveBeenCalledWith("Tagging EC2 resources...");
    expect(output.log).toHaveBeenCalledWith("EC2 instance: Found: 1, Tagged: 1, Failed: 0");
    expect(output.log).toHaveBeenCalledWith("EC2 EBS volume: Found: 1, Tagged: 0, Failed: 1");
    expect(output.log).toHaveBeenCalledWith("EC2 summary: Found: 2, Tagged: 1, Failed: 1");
    expect(output.log).toHaveBeenLastCalledWith("Completed tagging EC2 resources");
  });

  test("makes no calls when there are no tags", async () => {
    const output = captureConsole();
    const resourceTypes = jest.fn(() => []);

    const report = await runServicePass({ name: "S3", resourceTypes }, testContext({}));

    expect(resourceTypes).not.toHaveBeenCalled();
    expect(report.resourceTypes).toEqual([]);
    expect(output.warn).toHaveBeenCalledWith("No tags provided, skipping S3 resource tagging");
  });

  test("skips a service whose limits the tags break", async () => {
    const output = captureConsole();
    const resourceTypes = jest.fn(() => []);
    const tags = createTagSet("mig12345", { "aws:owner": "me" });

    await runServicePass(
      { name: "Athena", tagLimits: STANDARD_TAG_LIMITS, resourceTypes },
      testContext(tags)
    );

    expect(resourceTypes).not.toHaveBeenCalled();
    expect(output.error).toHaveBeenCalledWith(
      "Error: Invalid tags configuration for Athena: tag key cannot start with 'aws:': aws:owner"
    );
  });

  test("isolates a pass that throws", async () => {
    const output = captureConsole();
    const exploding: ResourceTypePass = {
      label: "dashboard",
      run: async () => {
        throw new Error("exploded");
      },
    };
    const alarms = fakeType("alarm", [{ items: [{ name: "cpu-high" }] }]);

    const report = await runServicePass(
      fakeService("CloudWatch", [exploding, alarms.pass]),
      testContext()
    );

    expect(output.error).toHaveBeenCalledWith(
      "Error tagging CloudWatch dashboard resources: exploded"
    );
    expect(report.metricsFor("alarm").tagged).toBe(1);
  });
});
