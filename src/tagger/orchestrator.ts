import type { RunContext } from "./context";
import { validateSession } from "./context";
import type { IdentityAPI } from "./context";
import { describeError } from "./errors";
import type { ServiceReport } from "./metrics";
import type { ServiceTagger } from "./pipeline";
import { runServicePass } from "./pipeline";

// Sleep after each service task
export const API_THROTTLE_SLEEP_MS = 1000;

export interface TagAllOptions {
  throttleMs?: number;
  signal?: AbortSignal;
  /** Identity client used for session validation; defaults to STS. */
  sts?: IdentityAPI;
}

/**
 * Runs one service tagger, then sleeps whether or not it succeeded
 */
async function executeWithThrottle(
  service: ServiceTagger,
  context: RunContext,
  throttleMs: number,
  signal?: AbortSignal
): Promise<ServiceReport> {
  console.log(`Starting tagging for service: ${service.name}`);
  try {
    const report = await runServicePass(service, context, signal);
    console.log(`Completed tagging for service: ${service.name}`);
    return report;
  } finally {
    await new Promise((resolve) => setTimeout(resolve, throttleMs));
  }
}

/**
 * Tags the resources of every given service concurrently.
 * Throws SessionValidationError before any tagging when the session is dead;
 * otherwise resolves once every service task has settled.
 */
export async function tagAllResources(
  context: RunContext,
  services: ServiceTagger[],
  options: TagAllOptions = {}
): Promise<Map<string, ServiceReport>> {
  const { throttleMs = API_THROTTLE_SLEEP_MS, signal, sts } = options;
  console.log("Starting MAP 2.0 resource tagging process...");

  await validateSession(context, sts, signal);

  const results = await Promise.allSettled(
    services.map((service) =>
      executeWithThrottle(service, context, throttleMs, signal)
    )
  );

  const reports = new Map<string, ServiceReport>();
  const errors: string[] = [];
  results.forEach((result, i) => {
    if (result.status === "fulfilled") {
      reports.set(services[i].name, result.value);
    } else {
      errors.push(`${services[i].name}: ${describeError(result.reason)}`);
    }
  });

  for (const error of errors) {
    console.error(`Error in tagging process: ${error}`);
  }
  console.log("Completed MAP 2.0 resource tagging process");
  return reports;
}
