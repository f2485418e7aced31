import { EC2 } from "@aws-sdk/client-ec2";
import type { ListedResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { toTagList } from "../tagger/tags";

export type EC2API = Pick<EC2, "describeInstances" | "describeVolumes" | "createTags">;

/**
 * Tags EC2 instances and EBS volumes; CreateTags addresses them by id
 */
export function ec2ResourceTypes(client: EC2API): ResourceTypePass[] {
  const createTags = async (
    resourceId: string,
    tags: KeyValueTag[],
    _item: ListedResource,
    signal?: AbortSignal
  ): Promise<void> => {
    await client.createTags(
      { Resources: [resourceId], Tags: tags },
      { abortSignal: signal }
    );
  };

  return [
    defineResourceType({
      label: "instance",
      list: async (nextToken, signal) => {
        const response = await client.describeInstances(
          { NextToken: nextToken },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const reservation of response.Reservations ?? []) {
          for (const instance of reservation.Instances ?? []) {
            if (instance.InstanceId && instance.State?.Name !== "terminated") {
              items.push({ name: instance.InstanceId });
            }
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (instance) => instance.name,
      convertTags: toTagList,
      apply: createTags,
    }),
    defineResourceType({
      label: "EBS volume",
      list: async (nextToken, signal) => {
        const response = await client.describeVolumes(
          { NextToken: nextToken },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const volume of response.Volumes ?? []) {
          if (volume.VolumeId) {
            items.push({ name: volume.VolumeId });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (volume) => volume.name,
      convertTags: toTagList,
      apply: createTags,
    }),
  ];
}

export const ec2Tagger: ServiceTagger = {
  name: "EC2",
  resourceTypes: (context) => ec2ResourceTypes(new EC2(context.clientConfig)),
};
