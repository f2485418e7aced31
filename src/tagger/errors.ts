/** Malformed --tag input. */
export class TagParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TagParseError";
  }
}

/** The TagSet breaks the limits of one service. */
export class TagValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TagValidationError";
  }
}

/** The credentials could not be used for an authenticated call. */
export class SessionValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionValidationError";
  }
}

/**
 * Shape shared by every AWS SDK v3 service exception
 */
export interface AwsServiceError extends Error {
  $fault: "client" | "server";
  $metadata: { httpStatusCode?: number; requestId?: string };
}

export function isAwsServiceError(error: unknown): error is AwsServiceError {
  return (
    error instanceof Error &&
    "$fault" in error &&
    (error.$fault === "client" || error.$fault === "server") &&
    "$metadata" in error &&
    typeof error.$metadata === "object" &&
    error.$metadata !== null
  );
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type ErrorCategory = "access-denied" | "not-found" | "throttled" | "unknown";

export interface LogAction {
  category: ErrorCategory;
  level: "warn" | "error";
  message: string;
}

type KnownCategory = Exclude<ErrorCategory, "unknown">;

const KNOWN_CATEGORIES: readonly KnownCategory[] = [
  "access-denied",
  "not-found",
  "throttled",
];

const ERROR_CODES: Record<KnownCategory, readonly string[]> = {
  "access-denied": ["AccessDenied", "AccessDeniedException", "UnauthorizedOperation"],
  "not-found": ["ResourceNotFoundException", "NotFoundException", "NoSuchBucket"],
  throttled: [
    "ThrottlingException",
    "Throttling",
    "TooManyRequestsException",
    "RequestLimitExceeded",
  ],
};

function categorize(error: unknown): ErrorCategory {
  if (!isAwsServiceError(error)) {
    return "unknown";
  }
  const code = error.name;
  return (
    KNOWN_CATEGORIES.find((category) => ERROR_CODES[category].includes(code)) ??
    "unknown"
  );
}

/**
 * Logs a failed tagging call with a message chosen by its error code and
 * returns what was logged. The caller always carries on with the next resource.
 */
export function classifyError(
  error: unknown,
  resourceId: string,
  service: string
): LogAction {
  const category = categorize(error);

  let action: LogAction;
  switch (category) {
    case "access-denied":
      action = {
        category,
        level: "warn",
        message: `Access denied while tagging ${service} resource ${resourceId}`,
      };
      break;
    case "not-found":
      action = {
        category,
        level: "warn",
        message: `Resource ${resourceId} not found in ${service}`,
      };
      break;
    case "throttled":
      action = {
        category,
        level: "warn",
        message: `Throttled while tagging ${service} resource ${resourceId}`,
      };
      break;
    default:
      action = {
        category,
        level: "error",
        message: `Error tagging ${service} resource ${resourceId}: ${describeError(error)}`,
      };
  }

  if (action.level === "warn") {
    console.warn(action.message);
  } else {
    console.error(action.message);
  }
  return action;
}
