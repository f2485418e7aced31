import type { ServiceTagger } from "../tagger/pipeline";
import { athenaTagger } from "./athena";
import { cloudWatchTagger } from "./cloudwatch";
import { ec2Tagger } from "./ec2";
import { elastiCacheTagger } from "./elasticache";
import { classicELBTagger, elbV2Tagger } from "./elb";
import { glueTagger } from "./glue";
import { openSearchTagger } from "./opensearch";
import { rdsTagger } from "./rds";
import { s3Tagger } from "./s3";
import { vpcTagger } from "./vpc";

/**
 * Every supported service. Adding a service means adding its tagger here.
 */
export function serviceRegistry(): ServiceTagger[] {
  return [
    ec2Tagger,
    s3Tagger,
    rdsTagger,
    glueTagger,
    athenaTagger,
    cloudWatchTagger,
    openSearchTagger,
    elastiCacheTagger,
    classicELBTagger,
    elbV2Tagger,
    vpcTagger,
  ];
}

/**
 * Picks the named services (case-insensitive) out of the registry, keeping
 * registry order. An empty list selects everything.
 */
export function selectServices(
  registry: ServiceTagger[],
  names: string[]
): ServiceTagger[] {
  if (names.length === 0) {
    return registry;
  }

  const wanted = new Set(names.map((name) => name.toLowerCase()));
  const unknown = [...wanted].filter(
    (name) => !registry.some((service) => service.name.toLowerCase() === name)
  );
  if (unknown.length > 0) {
    throw new Error(
      `unknown service(s): ${unknown.join(", ")}. Supported: ${registry
        .map((service) => service.name)
        .join(", ")}`
    );
  }

  return registry.filter((service) => wanted.has(service.name.toLowerCase()));
}
