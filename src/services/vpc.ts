import { EC2 } from "@aws-sdk/client-ec2";
import { VPCLattice } from "@aws-sdk/client-vpc-lattice";
import type {
  ArnResource,
  ListedResource,
  ResourceTypePass,
  ServiceTagger,
} from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { toTagList, toTagMap } from "../tagger/tags";

export type VPCEC2API = Pick<
  EC2,
  | "describeTransitGateways"
  | "describeTransitGatewayAttachments"
  | "describeTransitGatewayPeeringAttachments"
  | "createTags"
>;

export type VPCLatticeAPI = Pick<
  VPCLattice,
  "listServiceNetworks" | "listServices" | "tagResource"
>;

/** Transit Gateway attachment kinds tagged under each gateway, by resource-type filter. */
const ATTACHMENT_TYPES: { label: string; resourceType: string }[] = [
  { label: "VPN attachment", resourceType: "vpn" },
  { label: "VPC attachment", resourceType: "vpc" },
  { label: "Direct Connect attachment", resourceType: "direct-connect-gateway" },
];

/**
 * Tags Transit Gateways and, per gateway, its VPN, VPC, peering and
 * Direct Connect attachments.
 */
export function transitGatewayResourceTypes(client: VPCEC2API): ResourceTypePass[] {
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

  const attachments = (
    gatewayId: string,
    label: string,
    resourceType: string
  ): ResourceTypePass =>
    defineResourceType({
      label,
      list: async (nextToken, signal) => {
        const response = await client.describeTransitGatewayAttachments(
          {
            Filters: [
              { Name: "transit-gateway-id", Values: [gatewayId] },
              { Name: "resource-type", Values: [resourceType] },
            ],
            NextToken: nextToken,
          },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const attachment of response.TransitGatewayAttachments ?? []) {
          if (attachment.TransitGatewayAttachmentId) {
            items.push({ name: attachment.TransitGatewayAttachmentId });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (attachment) => attachment.name,
      convertTags: toTagList,
      apply: createTags,
    });

  const peeringAttachments = (gatewayId: string): ResourceTypePass =>
    defineResourceType({
      label: "peering attachment",
      list: async (nextToken, signal) => {
        const response = await client.describeTransitGatewayPeeringAttachments(
          {
            Filters: [{ Name: "transit-gateway-id", Values: [gatewayId] }],
            NextToken: nextToken,
          },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const attachment of response.TransitGatewayPeeringAttachments ?? []) {
          if (attachment.TransitGatewayAttachmentId) {
            items.push({ name: attachment.TransitGatewayAttachmentId });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (attachment) => attachment.name,
      convertTags: toTagList,
      apply: createTags,
    });

  return [
    defineResourceType({
      label: "transit gateway",
      list: async (nextToken, signal) => {
        const response = await client.describeTransitGateways(
          { NextToken: nextToken },
          { abortSignal: signal }
        );
        const items: ListedResource[] = [];
        for (const tgw of response.TransitGateways ?? []) {
          if (tgw.TransitGatewayId) {
            items.push({ name: tgw.TransitGatewayId });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (tgw) => tgw.name,
      convertTags: toTagList,
      apply: createTags,
      children: (tgw) => [
        ...ATTACHMENT_TYPES.map(({ label, resourceType }) =>
          attachments(tgw.name, label, resourceType)
        ),
        peeringAttachments(tgw.name),
      ],
    }),
  ];
}

/**
 * Tags VPC Lattice service networks and services
 */
export function latticeResourceTypes(client: VPCLatticeAPI): ResourceTypePass[] {
  const tagResource = async (
    arn: string,
    tags: Record<string, string>,
    _item: ArnResource,
    signal?: AbortSignal
  ): Promise<void> => {
    await client.tagResource({ resourceArn: arn, tags }, { abortSignal: signal });
  };

  return [
    defineResourceType({
      label: "Lattice service network",
      list: async (nextToken, signal) => {
        const response = await client.listServiceNetworks(
          { nextToken },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const network of response.items ?? []) {
          if (network.name && network.arn) {
            items.push({ name: network.name, arn: network.arn });
          }
        }
        return { items, nextToken: response.nextToken };
      },
      identify: (network) => network.arn,
      convertTags: toTagMap,
      apply: tagResource,
    }),
    defineResourceType({
      label: "Lattice service",
      list: async (nextToken, signal) => {
        const response = await client.listServices({ nextToken }, { abortSignal: signal });
        const items: ArnResource[] = [];
        for (const service of response.items ?? []) {
          if (service.name && service.arn) {
            items.push({ name: service.name, arn: service.arn });
          }
        }
        return { items, nextToken: response.nextToken };
      },
      identify: (service) => service.arn,
      convertTags: toTagMap,
      apply: tagResource,
    }),
  ];
}

export const vpcTagger: ServiceTagger = {
  name: "VPC",
  resourceTypes: (context) => [
    ...transitGatewayResourceTypes(new EC2(context.clientConfig)),
    ...latticeResourceTypes(new VPCLattice(context.clientConfig)),
  ],
};
