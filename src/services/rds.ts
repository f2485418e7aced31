import { RDS } from "@aws-sdk/client-rds";
import type { ArnResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { toTagList } from "../tagger/tags";

export type RDSAPI = Pick<
  RDS,
  | "describeDBInstances"
  | "describeDBClusters"
  | "describeDBSnapshots"
  | "describeDBClusterSnapshots"
  | "addTagsToResource"
>;

/**
 * Tags RDS DB instances, clusters and their snapshots by ARN
 */
export function rdsResourceTypes(client: RDSAPI): ResourceTypePass[] {
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
  const identify = (resource: ArnResource) => resource.arn;

  return [
    defineResourceType({
      label: "DB instance",
      list: async (marker, signal) => {
        const response = await client.describeDBInstances(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const db of response.DBInstances ?? []) {
          if (db.DBInstanceIdentifier && db.DBInstanceArn) {
            items.push({ name: db.DBInstanceIdentifier, arn: db.DBInstanceArn });
          }
        }
        return { items, nextToken: response.Marker };
      },
      identify,
      convertTags: toTagList,
      apply: addTags,
    }),
    defineResourceType({
      label: "DB cluster",
      list: async (marker, signal) => {
        const response = await client.describeDBClusters(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const cluster of response.DBClusters ?? []) {
          if (cluster.DBClusterIdentifier && cluster.DBClusterArn) {
            items.push({ name: cluster.DBClusterIdentifier, arn: cluster.DBClusterArn });
          }
        }
        return { items, nextToken: response.Marker };
      },
      identify,
      convertTags: toTagList,
      apply: addTags,
    }),
    defineResourceType({
      label: "DB snapshot",
      list: async (marker, signal) => {
        const response = await client.describeDBSnapshots(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const snapshot of response.DBSnapshots ?? []) {
          if (snapshot.DBSnapshotIdentifier && snapshot.DBSnapshotArn) {
            items.push({ name: snapshot.DBSnapshotIdentifier, arn: snapshot.DBSnapshotArn });
          }
        }
        return { items, nextToken: response.Marker };
      },
      identify,
      convertTags: toTagList,
      apply: addTags,
    }),
    defineResourceType({
      label: "DB cluster snapshot",
      list: async (marker, signal) => {
        const response = await client.describeDBClusterSnapshots(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const snapshot of response.DBClusterSnapshots ?? []) {
          if (snapshot.DBClusterSnapshotIdentifier && snapshot.DBClusterSnapshotArn) {
            items.push({
              name: snapshot.DBClusterSnapshotIdentifier,
              arn: snapshot.DBClusterSnapshotArn,
            });
          }
        }
        return { items, nextToken: response.Marker };
      },
      identify,
      convertTags: toTagList,
      apply: addTags,
    }),
  ];
}

export const rdsTagger: ServiceTagger = {
  name: "RDS",
  resourceTypes: (context) => rdsResourceTypes(new RDS(context.clientConfig)),
};
