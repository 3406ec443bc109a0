import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import {
  jobStages,
  type AnalysisJobPayload,
  type JobStage,
  type QueuePort,
} from "../../core/ports/outboundPorts";
import { queueNames } from "./queues";

export type QueueStageCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

export type QueueCountsSnapshot = Record<JobStage, QueueStageCounts>;

const QUEUE_RETRIES = 2;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  backoff: {
    type: "exponential",
    delay: 1_000,
  },
} as const;

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqQueue implements QueuePort {
  private readonly queues = new Map<JobStage, Queue<AnalysisJobPayload>>();

  constructor(private readonly connection: RedisOptions) {
    jobStages.forEach((stage) => {
      this.queues.set(
        stage,
        new Queue<AnalysisJobPayload>(queueNames[stage], {
          connection: this.connection,
          defaultJobOptions,
        }),
      );
    });
  }

  /**
   * Uses the idempotency key as the BullMQ job id, so re-submitting a queued document is a no-op.
   */
  async enqueue(stage: JobStage, payload: AnalysisJobPayload): Promise<void> {
    await this.queueFor(stage).add(payload.idempotencyKey, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async close(): Promise<void> {
    for (const queue of this.queues.values()) {
      await queue.close();
    }
  }

  /**
   * Collects per-stage queue counters for the status command.
   */
  async getQueueCounts(): Promise<QueueCountsSnapshot> {
    const counts = await this.queueFor("analyze").getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      analyze: {
        waiting: counts.waiting ?? 0,
        active: counts.active ?? 0,
        completed: counts.completed ?? 0,
        failed: counts.failed ?? 0,
        delayed: counts.delayed ?? 0,
        paused: counts.paused ?? 0,
      },
    };
  }

  private queueFor(stage: JobStage): Queue<AnalysisJobPayload> {
    const queue = this.queues.get(stage);
    if (!queue) {
      throw new Error(`Queue not configured for stage ${stage}`);
    }

    return queue;
  }
}

/**
 * Standardizes worker creation so stage consumers share retry and concurrency conventions.
 */
export const createStageWorker = (
  stage: JobStage,
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: AnalysisJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<AnalysisJobPayload>(
    queueNames[stage],
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
