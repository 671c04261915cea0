export type VoiceClientError =
  | { kind: "request"; message: string; cause: unknown }
  | { kind: "api"; status: number; message: string }
  | { kind: "parse"; message: string; cause: unknown }
  | { kind: "authentication"; message: string }
  | { kind: "rate_limited"; retryAfter?: number; message: string }
  | { kind: "quota_exceeded"; message: string }
  | { kind: "validation"; message: string; issues: string[] };

export type VoiceClientErrorKind = VoiceClientError["kind"];

function errorMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/** Seconds from a Retry-After header; HTTP-date values are not honoured. */
export function parseRetryAfter(header: string | null | undefined): number | undefined {
  if (header == null) return undefined;
  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return Number(trimmed);
}

/**
 * Maps a non-2xx response to an error kind. Pure: depends only on the status,
 * the raw body text and the Retry-After header.
 */
export function classifyHttpFailure(
  status: number,
  body: string,
  retryAfterHeader?: string | null,
): VoiceClientError {
  switch (status) {
    case 401:
      return { kind: "authentication", message: body };
    case 402:
      return { kind: "quota_exceeded", message: body };
    case 429: {
      const retryAfter = parseRetryAfter(retryAfterHeader);
      return retryAfter === undefined
        ? { kind: "rate_limited", message: body }
        : { kind: "rate_limited", retryAfter, message: body };
    }
    default:
      return { kind: "api", status, message: body };
  }
}

/** No HTTP response was obtained: DNS, connection refused, abort. */
export function classifyTransportFailure(cause: unknown): VoiceClientError {
  return { kind: "request", message: errorMessage(cause), cause };
}

export function parseFailure(cause: unknown): VoiceClientError {
  return { kind: "parse", message: errorMessage(cause), cause };
}

export function validationFailure(issues: string[]): VoiceClientError {
  return { kind: "validation", message: issues.join("; "), issues };
}

export function describeError(error: VoiceClientError): string {
  switch (error.kind) {
    case "request":
      return `Request failed: ${error.message}`;
    case "api":
      return `API error (${error.status}): ${error.message}`;
    case "parse":
      return `Failed to parse response: ${error.message}`;
    case "authentication":
      return `Authentication failed: ${error.message}`;
    case "rate_limited":
      return error.retryAfter === undefined
        ? `Rate limit exceeded: ${error.message}`
        : `Rate limit exceeded (retry in ${error.retryAfter}s): ${error.message}`;
    case "quota_exceeded":
      return `Quota exceeded: ${error.message}`;
    case "validation":
      return `Validation error: ${error.message}`;
    default: {
      const _exhaustive: never = error;
      return _exhaustive;
    }
  }
}
