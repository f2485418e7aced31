import { OpenSearch } from "@aws-sdk/client-opensearch";
import { OpenSearchDomain } from "../tagger/arn";
import type { RunContext } from "../tagger/context";
import { describeError, isAbortError } from "../tagger/errors";
import type { ListedResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { formatTags, toTagList } from "../tagger/tags";

export type OpenSearchAPI = Pick<OpenSearch, "listDomainNames" | "addTags" | "listTags">;

/**
 * Logs the domain's tags as OpenSearch reports them after tagging
 */
async function logCurrentTags(
  client: OpenSearchAPI,
  arn: string,
  domainName: string,
  signal?: AbortSignal
): Promise<void> {
  try {
    const response = await client.listTags({ ARN: arn }, { abortSignal: signal });
    const current: KeyValueTag[] = [];
    for (const tag of response.TagList ?? []) {
      if (tag.Key && tag.Value !== undefined) {
        current.push({ Key: tag.Key, Value: tag.Value });
      }
    }
    console.log(`Current tags for OpenSearch domain ${domainName}: ${formatTags(current)}`);
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      throw error;
    }
    console.error(
      `Error listing tags for OpenSearch domain ${domainName}: ${describeError(error)}`
    );
  }
}

/**
 * Tags OpenSearch domains
 */
export function openSearchResourceTypes(
  client: OpenSearchAPI,
  context: RunContext
): ResourceTypePass[] {
  return [
    defineResourceType({
      label: "domain",
      // ListDomainNames returns every domain in one response
      list: async (_nextToken, signal) => {
        const response = await client.listDomainNames({}, { abortSignal: signal });
        const items: ListedResource[] = [];
        for (const domain of response.DomainNames ?? []) {
          if (domain.DomainName) {
            items.push({ name: domain.DomainName });
          }
        }
        return { items };
      },
      identify: (domain) => context.arns.buildARN(OpenSearchDomain, domain.name),
      convertTags: toTagList,
      apply: async (arn, tags, domain, signal) => {
        await client.addTags({ ARN: arn, TagList: tags }, { abortSignal: signal });
        await logCurrentTags(client, arn, domain.name, signal);
      },
    }),
  ];
}

export const openSearchTagger: ServiceTagger = {
  name: "OpenSearch",
  resourceTypes: (context) =>
    openSearchResourceTypes(new OpenSearch(context.clientConfig), context),
};
