import { loggerFactory } from "@bulwark/logger";

/**
 * Package logger used by breakers and retry policies that are not given one.
 */
export const { logger: resilienceLogger } = loggerFactory({
  name: "resilience",
});
