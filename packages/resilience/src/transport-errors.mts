import { isCircuitBreakerError } from "./types.mjs";

// node errno and undici codes for failures below the application protocol
const transportErrorCodes: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETDOWN",
  "ENETUNREACH",
  "EHOSTDOWN",
  "EHOSTUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const maxCauseDepth = 5;

function matchesTransport(error: unknown, depth: number): boolean {
  if (depth > maxCauseDepth || typeof error !== "object" || error === null) {
    return false;
  }

  if (isCircuitBreakerError(error)) {
    switch (error.kind) {
      case "timeout":
        return true;
      case "open":
        return false;
      case "execution-failure":
        return matchesTransport(error.cause, depth + 1);
    }
  }

  if (
    "code" in error &&
    typeof error.code === "string" &&
    transportErrorCodes.has(error.code)
  ) {
    return true;
  }

  return "cause" in error && matchesTransport(error.cause, depth + 1);
}

/**
 * True for connection-level failures: socket errors by their errno code
 * (also when wrapped as a `cause`, as fetch does), and breaker timeouts.
 * An open-circuit rejection is not a transport error.
 */
export function isTransportError(error: unknown): boolean {
  return matchesTransport(error, 0);
}
