#!/usr/bin/env node
import { selectServices, serviceRegistry } from "../services";
import { createRunContext } from "../tagger/context";
import { SessionValidationError, describeError, isAbortError } from "../tagger/errors";
import { tagAllResources } from "../tagger/orchestrator";
import type { ServiceTagger } from "../tagger/pipeline";
import { createTagSet, formatTags } from "../tagger/tags";
import type { CliOptions } from "./cli";
import { buildProgram, parseCliOptions } from "./cli";

/**
 * Main entry point
 */
async function main() {
  const program = buildProgram();

  let options: CliOptions;
  let services: ServiceTagger[];
  try {
    options = parseCliOptions(process.argv.slice(2), program);
    services = selectServices(serviceRegistry(), options.services);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    program.outputHelp({ error: true });
    process.exitCode = 1;
    return;
  }

  console.log(`Using AWS Profile: ${options.profile}`);
  console.log(`Using AWS Region: ${options.region}`);

  const tags = createTagSet(options.mapMigrated, options.tags);
  console.log(`Tags to be applied: ${formatTags(tags)}`);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("Interrupted, stopping tagging...");
    controller.abort();
  });

  const context = await createRunContext({
    profile: options.profile,
    region: options.region,
    tags,
    signal: controller.signal,
  });

  const startTime = Date.now();
  await tagAllResources(context, services, {
    throttleMs: options.throttleMs,
    signal: controller.signal,
  });

  const duration = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log(`Total execution time: ${duration} seconds`);
}

main().catch((error) => {
  if (error instanceof SessionValidationError) {
    console.error(`Session validation failed: ${error.message}`);
  } else if (isAbortError(error)) {
    console.error("Tagging interrupted");
  } else {
    console.error("Unhandled error:", error);
  }
  process.exit(1);
});
