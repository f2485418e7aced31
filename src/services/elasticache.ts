import { ElastiCache } from "@aws-sdk/client-elasticache";
import type { ArnResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { toTagList } from "../tagger/tags";

export type ElastiCacheAPI = Pick<
  ElastiCache,
  "describeCacheClusters" | "describeReplicationGroups" | "addTagsToResource"
>;

/**
 * Tags ElastiCache cache clusters and replication groups
 */
export function elastiCacheResourceTypes(client: ElastiCacheAPI): ResourceTypePass[] {
  const addTags = async (
    arn: string,
    tags: KeyValueTag[],
    _item: ArnResource,
    signal?: AbortSignal
  ): Promise<void> => {
    await client.addTagsToResource(
      { ResourceName: arn, Tags: tags },
      { abortSignal: signal }
    );
  };

  return [
    defineResourceType({
      label: "cache cluster",
      list: async (marker, signal) => {
        const response = await client.describeCacheClusters(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const cluster of response.CacheClusters ?? []) {
          if (cluster.CacheClusterId && cluster.ARN) {
            items.push({ name: cluster.CacheClusterId, arn: cluster.ARN });
          }
        }
        return { items, nextToken: response.Marker };
      },
      identify: (cluster) => cluster.arn,
      convertTags: toTagList,
      apply: addTags,
    }),
    defineResourceType({
      label: "replication group",
      list: async (marker, signal) => {
        const response = await client.describeReplicationGroups(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const group of response.ReplicationGroups ?? []) {
          if (group.ReplicationGroupId && group.ARN) {
            items.push({ name: group.ReplicationGroupId, arn: group.ARN });
          }
        }
        return { items, nextToken: response.Marker };
      },
      identify: (group) => group.arn,
      convertTags: toTagList,
      apply: addTags,
    }),
  ];
}

export const elastiCacheTagger: ServiceTagger = {
  name: "ElastiCache",
  resourceTypes: (context) =>
    elastiCacheResourceTypes(new ElastiCache(context.clientConfig)),
};
