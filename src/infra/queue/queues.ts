import type { JobStage } from "../../core/ports/outboundPorts";

/**
 * Hyphen-only queue names: BullMQ uses colon as an internal Redis key separator.
 */
export const queueNames: Record<JobStage, string> = {
  analyze: "prospectus-analyze",
};
