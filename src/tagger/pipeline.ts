import type { RunContext } from "./context";
import { classifyError, describeError, isAbortError } from "./errors";
import { ServiceReport } from "./metrics";
import type { TagLimits, TagSet } from "./tags";
import { isEmptyTagSet, validateTagSet } from "./tags";

/**
 * One page of a listing call
 */
export interface Page<TItem> {
  items: TItem[];
  nextToken?: string;
}

/**
 * A named resource returned by a listing call
 */
export interface ListedResource {
  name: string;
}

/**
 * A listed resource whose ARN came back with the listing
 */
export interface ArnResource extends ListedResource {
  arn: string;
}

/**
 * Everything that differs between the resource types of the services:
 * how to list them, which to skip, how to address them and how to tag them.
 */
export interface ResourceTypeDefinition<TItem extends ListedResource, TTags> {
  /** Human label used in log lines, e.g. "workgroup". */
  label: string;
  list: (nextToken: string | undefined, signal?: AbortSignal) => Promise<Page<TItem>>;
  exclude?: (item: TItem) => boolean;
  identify: (item: TItem) => string;
  convertTags: (tags: TagSet) => TTags;
  apply: (
    identifier: string,
    tags: TTags,
    item: TItem,
    signal?: AbortSignal
  ) => Promise<void>;
  /** Resource types scoped to one listed item, tagged right after it. */
  children?: (item: TItem) => ResourceTypePass[];
}

export interface PassScope {
  context: RunContext;
  report: ServiceReport;
  signal?: AbortSignal;
}

export interface ResourceTypePass {
  readonly label: string;
  run(scope: PassScope): Promise<void>;
}

/**
 * Per-service tagger registered with the orchestrator
 */
export interface ServiceTagger {
  name: string;
  tagLimits?: TagLimits;
  resourceTypes(context: RunContext): ResourceTypePass[];
}

function checkAborted(signal?: AbortSignal): void {
  signal?.throwIfAborted();
}

/**
 * Builds the list → filter → identify → convert → apply → classify loop for one
 * resource type. Listing failures end this pass only; tagging failures are
 * counted and the loop moves on to the next resource.
 */
export function defineResourceType<TItem extends ListedResource, TTags>(
  definition: ResourceTypeDefinition<TItem, TTags>
): ResourceTypePass {
  return {
    label: definition.label,
    async run({ context, report, signal }: PassScope): Promise<void> {
      const service = report.service;
      const metrics = report.metricsFor(definition.label);
      const tags = definition.convertTags(context.tags);

      let nextToken: string | undefined;
      do {
        checkAborted(signal);

        let page: Page<TItem>;
        try {
          page = await definition.list(nextToken, signal);
        } catch (error) {
          if (signal?.aborted || isAbortError(error)) {
            throw error;
          }
          console.error(
            `Error listing ${service} ${definition.label} resources: ${describeError(error)}`
          );
          return;
        }

        for (const item of page.items) {
          checkAborted(signal);

          if (definition.exclude?.(item)) {
            console.log(`Skipping ${service} ${definition.label}: ${item.name}`);
            continue;
          }

          metrics.found++;
          const identifier = definition.identify(item);

          try {
            await definition.apply(identifier, tags, item, signal);
            metrics.tagged++;
            console.log(
              `Successfully tagged ${service} ${definition.label}: ${item.name}`
            );
          } catch (error) {
            if (signal?.aborted || isAbortError(error)) {
              throw error;
            }
            metrics.failed++;
            classifyError(error, identifier, `${service} ${definition.label}`);
          }

          for (const child of definition.children?.(item) ?? []) {
            await child.run({ context, report, signal });
          }
        }

        nextToken = page.nextToken;
      } while (nextToken);
    },
  };
}

/**
 * Runs every resource type of one service in declared order and logs its summary.
 */
export async function runServicePass(
  service: ServiceTagger,
  context: RunContext,
  signal?: AbortSignal
): Promise<ServiceReport> {
  const report = new ServiceReport(service.name);
  console.log(`Tagging ${service.name} resources...`);

  if (isEmptyTagSet(context.tags)) {
    console.warn(`No tags provided, skipping ${service.name} resource tagging`);
    return report;
  }

  if (service.tagLimits) {
    try {
      validateTagSet(context.tags, service.tagLimits);
    } catch (error) {
      console.error(
        `Error: Invalid tags configuration for ${service.name}: ${describeError(error)}`
      );
      return report;
    }
  }

  for (const pass of service.resourceTypes(context)) {
    try {
      await pass.run({ context, report, signal });
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      console.error(
        `Error tagging ${service.name} ${pass.label} resources: ${describeError(error)}`
      );
    }
  }

  report.logSummary();
  console.log(`Completed tagging ${service.name} resources`);
  return report;
}
