import { Athena } from "@aws-sdk/client-athena";
import { AthenaCatalog, AthenaWorkgroup } from "../tagger/arn";
import type { RunContext } from "../tagger/context";
import type { ListedResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { STANDARD_TAG_LIMITS, toTagList } from "../tagger/tags";

export type AthenaAPI = Pick<Athena, "listWorkGroups" | "listDataCatalogs" | "tagResource">;

// Every account has this workgroup and it is not ours to tag
export const PRIMARY_WORKGROUP = "primary";

/**
 * Tags Athena workgroups and data catalogs
 */
export function athenaResourceTypes(
  client: AthenaAPI,
  context: RunContext
): ResourceTypePass[] {
  const tagResource = async (
    arn: string,
    tags: KeyValueTag[],
    _item: ListedResource,
    signal?: AbortSignal
  ): Promise<void> => {
    await client.tagResource(
      { ResourceARN: arn, Tags: tags },
      { abortSignal: signal }
    );
  };

  return [
    defineResourceType({
      label: "workgroup",
      list: async (nextToken, signal) => {
        const response = await client.listWorkGroups(
          { NextToken: nextToken },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const workgroup of response.WorkGroups ?? []) {
          if (workgroup.Name) {
            items.push({ name: workgroup.Name });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      exclude: (workgroup) => workgroup.name === PRIMARY_WORKGROUP,
      identify: (workgroup) =>
        context.arns.buildCompoundARN(AthenaWorkgroup, workgroup.name),
      convertTags: toTagList,
      apply: tagResource,
    }),
    defineResourceType({
      label: "data catalog",
      list: async (nextToken, signal) => {
        const response = await client.listDataCatalogs(
          { NextToken: nextToken },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const catalog of response.DataCatalogsSummary ?? []) {
          if (catalog.CatalogName) {
            items.push({ name: catalog.CatalogName });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (catalog) => context.arns.buildCompoundARN(AthenaCatalog, catalog.name),
      convertTags: toTagList,
      apply: tagResource,
    }),
  ];
}

export const athenaTagger: ServiceTagger = {
  name: "Athena",
  tagLimits: STANDARD_TAG_LIMITS,
  resourceTypes: (context) =>
    athenaResourceTypes(new Athena(context.clientConfig), context),
};
