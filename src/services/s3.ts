import { S3 } from "@aws-sdk/client-s3";
import type { Tag } from "@aws-sdk/client-s3";
import type { ListedResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { toTagList } from "../tagger/tags";

export type S3API = Pick<S3, "listBuckets" | "getBucketTagging" | "putBucketTagging">;

/**
 * Reads the bucket's current tags. A bucket without tags answers NoSuchTagSet.
 */
async function getExistingTags(
  client: S3API,
  bucket: string,
  signal?: AbortSignal
): Promise<Tag[]> {
  try {
    const response = await client.getBucketTagging(
      { Bucket: bucket },
      { abortSignal: signal }
    );
    return response.TagSet ?? [];
  } catch (error) {
    if (error instanceof Error && error.name === "NoSuchTagSet") {
      return [];
    }
    throw error;
  }
}

/**
 * Merges the bucket's own tags with the run's tags, the run's tags winning.
 * Tags under the reserved aws: prefix cannot be written back and are left out.
 */
export function mergeBucketTags(existing: Tag[], tags: KeyValueTag[]): KeyValueTag[] {
  const merged = new Map<string, string>();
  for (const tag of existing) {
    if (tag.Key && tag.Value !== undefined && !tag.Key.startsWith("aws:")) {
      merged.set(tag.Key, tag.Value);
    }
  }
  for (const tag of tags) {
    merged.set(tag.Key, tag.Value);
  }
  return Array.from(merged, ([Key, Value]) => ({ Key, Value }));
}

/**
 * Tags S3 buckets. PutBucketTagging replaces the whole tag set, so the
 * bucket's existing tags are read and kept.
 */
export function s3ResourceTypes(client: S3API): ResourceTypePass[] {
  return [
    defineResourceType({
      label: "bucket",
      list: async (nextToken, signal) => {
        const response = await client.listBuckets(
          { ContinuationToken: nextToken },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const bucket of response.Buckets ?? []) {
          if (bucket.Name) {
            items.push({ name: bucket.Name });
          }
        }
        return { items, nextToken: response.ContinuationToken };
      },
      identify: (bucket) => bucket.name,
      convertTags: toTagList,
      apply: async (bucketName, tags, _bucket, signal) => {
        const existing = await getExistingTags(client, bucketName, signal);
        await client.putBucketTagging(
          {
            Bucket: bucketName,
            Tagging: { TagSet: mergeBucketTags(existing, tags) },
          },
          { abortSignal: signal }
        );
      },
    }),
  ];
}

export const s3Tagger: ServiceTagger = {
  name: "S3",
  resourceTypes: (context) =>
    s3ResourceTypes(
      new S3({ ...context.clientConfig, followRegionRedirects: true })
    ),
};
