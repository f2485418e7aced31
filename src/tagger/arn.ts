import { format } from "node:util";

/**
 * Describes how the ARN of one kind of resource is formed.
 * The pattern takes region, account id and resource name, in that order.
 */
export interface ResourceType {
  service: string;
  type: string;
  arnPattern: string;
}

export const AthenaWorkgroup: ResourceType = {
  service: "athena",
  type: "workgroup",
  arnPattern: "arn:aws:athena:%s:%s:workgroup/%s",
};

export const AthenaCatalog: ResourceType = {
  service: "athena",
  type: "datacatalog",
  arnPattern: "arn:aws:athena:%s:%s:datacatalog/%s",
};

export const GlueDatabase: ResourceType = {
  service: "glue",
  type: "database",
  arnPattern: "arn:aws:glue:%s:%s:database/%s",
};

export const GlueTable: ResourceType = {
  service: "glue",
  type: "table",
  arnPattern: "arn:aws:glue:%s:%s:table/%s",
};

export const GlueConnection: ResourceType = {
  service: "glue",
  type: "connection",
  arnPattern: "arn:aws:glue:%s:%s:connection/%s",
};

export const GlueCrawler: ResourceType = {
  service: "glue",
  type: "crawler",
  arnPattern: "arn:aws:glue:%s:%s:crawler/%s",
};

export const GlueJob: ResourceType = {
  service: "glue",
  type: "job",
  arnPattern: "arn:aws:glue:%s:%s:job/%s",
};

export const GlueTrigger: ResourceType = {
  service: "glue",
  type: "trigger",
  arnPattern: "arn:aws:glue:%s:%s:trigger/%s",
};

export const GlueWorkflow: ResourceType = {
  service: "glue",
  type: "workflow",
  arnPattern: "arn:aws:glue:%s:%s:workflow/%s",
};

export const OpenSearchDomain: ResourceType = {
  service: "es",
  type: "domain",
  arnPattern: "arn:aws:es:%s:%s:domain/%s",
};

/**
 * Removes leading/trailing slashes and collapses repeated slashes into one
 */
export function cleanResourceName(name: string): string {
  return name.replace(/\/{2,}/g, "/").replace(/^\/+|\/+$/g, "");
}

/**
 * Builds resource ARNs for one region and account.
 */
export class ArnBuilder {
  constructor(
    private readonly region: string,
    private readonly accountId: string
  ) {}

  buildARN(resourceType: ResourceType, resourceName: string): string {
    return format(
      resourceType.arnPattern,
      this.region,
      this.accountId,
      cleanResourceName(resourceName)
    );
  }

  /**
   * Builds an ARN for resources addressed by several name segments
   * (e.g. database/table). Segments that are empty once cleaned are dropped.
   */
  buildCompoundARN(resourceType: ResourceType, ...parts: string[]): string {
    const cleanParts = parts
      .map((part) => cleanResourceName(part))
      .filter((part) => part !== "");

    return this.buildARN(resourceType, cleanParts.join("/"));
  }
}
