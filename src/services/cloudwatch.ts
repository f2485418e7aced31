import { CloudWatch } from "@aws-sdk/client-cloudwatch";
import type { ArnResource, ResourceTypePass, ServiceTagger } from "../tagger/pipeline";
import { defineResourceType } from "../tagger/pipeline";
import type { KeyValueTag } from "../tagger/tags";
import { toTagList } from "../tagger/tags";

export type CloudWatchAPI = Pick<CloudWatch, "describeAlarms" | "listDashboards" | "tagResource">;

/**
 * Tags CloudWatch alarms (metric and composite) and dashboards
 */
export function cloudWatchResourceTypes(client: CloudWatchAPI): ResourceTypePass[] {
  const tagResource = async (
    arn: string,
    tags: KeyValueTag[],
    _item: ArnResource,
    signal?: AbortSignal
  ): Promise<void> => {
    await client.tagResource({ ResourceARN: arn, Tags: tags }, { abortSignal: signal });
  };

  return [
    defineResourceType({
      label: "alarm",
      list: async (nextToken, signal) => {
        const response = await client.describeAlarms(
          { AlarmTypes: ["MetricAlarm", "CompositeAlarm"], NextToken: nextToken },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const alarm of [
          ...(response.MetricAlarms ?? []),
          ...(response.CompositeAlarms ?? []),
        ]) {
          if (alarm.AlarmName && alarm.AlarmArn) {
            items.push({ name: alarm.AlarmName, arn: alarm.AlarmArn });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (alarm) => alarm.arn,
      convertTags: toTagList,
      apply: tagResource,
    }),
    defineResourceType({
      label: "dashboard",
      list: async (nextToken, signal) => {
        const response = await client.listDashboards(
          { NextToken: nextToken },
          { abortSignal: signal }
        );
        const items: ArnResource[] = [];
        for (const dashboard of response.DashboardEntries ?? []) {
          if (dashboard.DashboardName && dashboard.DashboardArn) {
            items.push({ name: dashboard.DashboardName, arn: dashboard.DashboardArn });
          }
        }
        return { items, nextToken: response.NextToken };
      },
      identify: (dashboard) => dashboard.arn,
      convertTags: toTagList,
      apply: tagResource,
    }),
  ];
}

export const cloudWatchTagger: ServiceTagger = {
  name: "CloudWatch",
  resourceTypes: (context) => cloudWatchResourceTypes(new CloudWatch(context.clientConfig)),
};
