import { ElasticLoadBalancing } from "@aws-sdk/client-elastic-load-balancing";
import { ElasticLoadBalancingV2 } from "@aws-sdk/client-elastic-load-balancing-v2";
import type { ArnResource, ListedResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { toTagList } from "../tagger/tags";

export type ClassicELBAPI = Pick<ElasticLoadBalancing, "describeLoadBalancers" | "addTags">;

export type ELBv2API = Pick<
  ElasticLoadBalancingV2,
  "describeLoadBalancers" | "describeTargetGroups" | "addTags"
>;

/**
 * Tags Classic Load Balancers, which are addressed by name
 */
export function classicELBResourceTypes(client: ClassicELBAPI): ResourceTypePass[] {
  return [
    defineResourceType({
      label: "Classic Load Balancer",
      list: async (marker, signal) => {
        const response = await client.describeLoadBalancers(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const lb of response.LoadBalancerDescriptions ?? []) {
          if (lb.LoadBalancerName) {
            items.push({ name: lb.LoadBalancerName });
          }
        }
        return { items, nextToken: response.NextMarker };
      },
      identify: (lb) => lb.name,
      convertTags: toTagList,
      apply: async (lbName, tags, _lb, signal) => {
        await client.addTags(
          { LoadBalancerNames: [lbName], Tags: tags },
          { abortSignal: signal }
        );
      },
    }),
  ];
}

/**
 * Tags Application, Network and Gateway Load Balancers, then the target groups
 * attached to each of them.
 */
export function elbV2ResourceTypes(client: ELBv2API): ResourceTypePass[] {
  const addTags = async (
    arn: string,
    tags: KeyValueTag[],
    _item: ArnResource,
    signal?: AbortSignal
  ): Promise<void> => {
    await client.addTags({ ResourceArns: [arn], Tags: tags }, { abortSignal: signal });
  };

  const targetGroups = (lb: ArnResource): ResourceTypePass =>
    defineResourceType({
      label: "target group",
      list: async (marker, signal) => {
        const response = await client.describeTargetGroups(
          { LoadBalancerArn: lb.arn, Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const tg of response.TargetGroups ?? []) {
          if (tg.TargetGroupName && tg.TargetGroupArn) {
            items.push({ name: tg.TargetGroupName, arn: tg.TargetGroupArn });
          }
        }
        return { items, nextToken: response.NextMarker };
      },
      identify: (tg) => tg.arn,
      convertTags: toTagList,
      apply: addTags,
    });

  return [
    defineResourceType({
      label: "load balancer",
      list: async (marker, signal) => {
        const response = await client.describeLoadBalancers(
          { Marker: marker },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const lb of response.LoadBalancers ?? []) {
          if (lb.LoadBalancerName && lb.LoadBalancerArn) {
            items.push({
              name: lb.Type ? `${lb.LoadBalancerName} (${lb.Type})` : lb.LoadBalancerName,
              arn: lb.LoadBalancerArn,
            });
          }
        }
        return { items, nextToken: response.NextMarker };
      },
      identify: (lb) => lb.arn,
      convertTags: toTagList,
      apply: addTags,
      children: (lb) => [targetGroups(lb)],
    }),
  ];
}

export const classicELBTagger: ServiceTagger = {
  name: "ELB",
  resourceTypes: (context) =>
    classicELBResourceTypes(new ElasticLoadBalancing(context.clientConfig)),
};

export const elbV2Tagger: ServiceTagger = {
  name: "ELBv2",
  resourceTypes: (context) =>
    elbV2ResourceTypes(new ElasticLoadBalancingV2(context.clientConfig)),
};
