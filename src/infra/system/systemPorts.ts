import type {
  AnalysisJobFactoryPort,
  AnalysisJobPayload,
  ClockPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Produces the UUIDs used as file ids and job ids.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return crypto.randomUUID();
  }
}

/**
 * Builds analysis job payloads. The idempotency key is the file id, so a document is queued
 * at most once while its job is retained. Hyphen delimiters only: BullMQ job ids cannot contain colons.
 */
export class AnalysisJobFactory implements AnalysisJobFactoryPort {
  constructor(
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  create(fileId: string): AnalysisJobPayload {
    return {
      jobId: this.ids.next(),
      fileId,
      idempotencyKey: `analyze-${fileId}`,
      requestedAt: this.clock.now().toISOString(),
    };
  }
}
