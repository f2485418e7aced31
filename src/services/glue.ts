import { Glue } from "@aws-sdk/client-glue";
import type { ResourceType } from "../tagger/arn";
import {
  GlueConnection,
  GlueCrawler,
  GlueDatabase,
  GlueJob,
  GlueTrigger,
  GlueWorkflow,
} from "../tagger/arn";
import type { RunContext } from "../tagger/context";
import type {
  ListedResource,
  Page,
  ResourceTypePass,
  ServiceTagger,
} from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import { STANDARD_TAG_LIMITS, toTagMap } from "../tagger/tags";

export type GlueAPI = Pick<
  Glue,
  | "getDatabases"
  | "getConnections"
  | "getCrawlers"
  | "getJobs"
  | "getTriggers"
  | "listWorkflows"
  | "tagResource"
>;

const GLUE_PAGE_SIZE = 100;
// ListWorkflows rejects page sizes above 25
const GLUE_WORKFLOW_PAGE_SIZE = 25;

function named(names: (string | undefined)[]): ListedResource[] {
  const items: ListedResource[] = [];
  for (const name of names) {
    if (name) {
      items.push({ name });
    }
  }
  return items;
}

/**
 * Tags Glue databases, connections, crawlers, jobs, triggers and workflows.
 * Glue listings carry no ARNs, so they are built from the resource names.
 * Tables are not taggable and are left alone.
 */
export function glueResourceTypes(
  client: GlueAPI,
  context: RunContext
): ResourceTypePass[] {
  const glueType = (
    label: string,
    resourceType: ResourceType,
    list: (nextToken: string | undefined, signal?: AbortSignal) => Promise<Page<ListedResource>>
  ): ResourceTypePass =>
    defineResourceType({
      label,
      list,
      identify: (resource) => context.arns.buildCompoundARN(resourceType, resource.name),
      convertTags: toTagMap,
      apply: async (arn, tags, _resource, signal) => {
        await client.tagResource(
          { ResourceArn: arn, TagsToAdd: tags },
          { abortSignal: signal }
        );
      },
    });

  return [
    glueType("database", GlueDatabase, async (nextToken, signal) => {
      const response = await client.getDatabases(
        { NextToken: nextToken },
        { abortSignal: signal }
      );
      return {
        items: named((response.DatabaseList ?? []).map((db) => db.Name)),
        nextToken: response.NextToken,
      };
    }),
    glueType("connection", GlueConnection, async (nextToken, signal) => {
      const response = await client.getConnections(
        { NextToken: nextToken },
        { abortSignal: signal }
      );
      return {
        items: named((response.ConnectionList ?? []).map((conn) => conn.Name)),
        nextToken: response.NextToken,
      };
    }),
    glueType("crawler", GlueCrawler, async (nextToken, signal) => {
      const response = await client.getCrawlers(
        { MaxResults: GLUE_PAGE_SIZE, NextToken: nextToken },
        { abortSignal: signal }
      );
      return {
        items: named((response.Crawlers ?? []).map((crawler) => crawler.Name)),
        nextToken: response.NextToken,
      };
    }),
    glueType("job", GlueJob, async (nextToken, signal) => {
      const response = await client.getJobs(
        { MaxResults: GLUE_PAGE_SIZE, NextToken: nextToken },
        { abortSignal: signal }
      );
      return {
        items: named((response.Jobs ?? []).map((job) => job.Name)),
        nextToken: response.NextToken,
      };
    }),
    glueType("trigger", GlueTrigger, async (nextToken, signal) => {
      const response = await client.getTriggers(
        { MaxResults: GLUE_PAGE_SIZE, NextToken: nextToken },
        { abortSignal: signal }
      );
      return {
        items: named((response.Triggers ?? []).map((trigger) => trigger.Name)),
        nextToken: response.NextToken,
      };
    }),
    glueType("workflow", GlueWorkflow, async (nextToken, signal) => {
      const response = await client.listWorkflows(
        { MaxResults: GLUE_WORKFLOW_PAGE_SIZE, NextToken: nextToken },
        { abortSignal: signal }
      );
      return {
        items: named(response.Workflows ?? []),
        nextToken: response.NextToken,
      };
    }),
  ];
}

export const glueTagger: ServiceTagger = {
  name: "Glue",
  tagLimits: STANDARD_TAG_LIMITS,
  resourceTypes: (context) =>
    glueResourceTypes(new Glue(context.clientConfig), context),
};
