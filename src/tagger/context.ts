import { STS } from "@aws-sdk/client-sts";
import { fromIni } from "@aws-sdk/credential-providers";
import type {
  AwsCredentialIdentity,
  AwsCredentialIdentityProvider,
} from "@aws-sdk/types";
import { ArnBuilder } from "./arn";
import { SessionValidationError, describeError, isAbortError } from "./errors";
import type { TagSet } from "./tags";

/**
 * Configuration every service client is created from
 */
export interface ClientConfig {
  region: string;
  credentials: AwsCredentialIdentity | AwsCredentialIdentityProvider;
}

/**
 * Shared, read-only state of one tagging run.
 */
export interface RunContext {
  readonly region: string;
  readonly accountId: string;
  readonly tags: TagSet;
  readonly clientConfig: ClientConfig;
  readonly arns: ArnBuilder;
}

export type IdentityAPI = Pick<STS, "getCallerIdentity">;

export interface RunContextOptions {
  profile: string;
  region: string;
  tags: TagSet;
  signal?: AbortSignal;
}

/**
 * Gets the AWS account ID of the credentials using STS
 */
export async function getAccountId(
  sts: IdentityAPI,
  signal?: AbortSignal
): Promise<string> {
  try {
    const response = await sts.getCallerIdentity({}, { abortSignal: signal });
    if (!response.Account) {
      throw new Error("caller identity has no account");
    }
    return response.Account;
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      throw error;
    }
    throw new SessionValidationError(
      `unable to get caller identity: ${describeError(error)}`,
      { cause: error }
    );
  }
}

export function buildRunContext(
  clientConfig: ClientConfig,
  accountId: string,
  tags: TagSet
): RunContext {
  return Object.freeze({
    region: clientConfig.region,
    accountId,
    tags,
    clientConfig,
    arns: new ArnBuilder(clientConfig.region, accountId),
  });
}

/**
 * Loads credentials for the profile and resolves the account the run works in.
 */
export async function createRunContext(
  options: RunContextOptions
): Promise<RunContext> {
  const clientConfig: ClientConfig = {
    region: options.region,
    credentials: fromIni({ profile: options.profile }),
  };

  const accountId = await getAccountId(new STS(clientConfig), options.signal);
  console.log(`Using AWS Account ID: ${accountId}`);

  return buildRunContext(clientConfig, accountId, options.tags);
}

/**
 * Makes one cheap authenticated call to confirm the session is still live
 */
export async function validateSession(
  context: RunContext,
  sts: IdentityAPI = new STS(context.clientConfig),
  signal?: AbortSignal
): Promise<void> {
  try {
    await sts.getCallerIdentity({}, { abortSignal: signal });
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      throw error;
    }
    throw new SessionValidationError(
      `unable to validate session: ${describeError(error)}`,
      { cause: error }
    );
  }
}
