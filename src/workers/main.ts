import { UnrecoverableError } from "bullmq";
import {
  createRuntime,
  redisConfigFromUrl,
} from "../application/bootstrap/runtimeFactory";
import { createStageWorker } from "../infra/queue/bullMqQueue";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

/**
 * Warms the analysis cache for submitted documents. A missing or unreadable document fails
 * its job without retries; thrown errors (storage, Redis) are retried with exponential backoff.
 */
const run = async (): Promise<void> => {
  const runtime = createRuntime();
  const redis = redisConfigFromUrl(env.REDIS_URL);
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      documentStore: env.DOCUMENT_STORE,
      concurrency: env.QUEUE_CONCURRENCY_ANALYZE,
      redisUrl: env.REDIS_URL,
      postgresUrl: env.POSTGRES_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createStageWorker(
    "analyze",
    redis,
    env.QUEUE_CONCURRENCY_ANALYZE,
    async (payload) => {
      const analysis = await runtime.insightService.analyze(payload.fileId);
      if (analysis.isErr()) {
        throw new UnrecoverableError(
          `Analysis of '${payload.fileId}' failed (${analysis.error.code}): ${analysis.error.message}`,
        );
      }
    },
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      {
        stage: worker.name,
        jobId: job.id,
        fileId: job.data.fileId,
        idempotencyKey: job.data.idempotencyKey,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        stage: worker.name,
        jobId: job?.id,
        fileId: job?.data.fileId,
        attemptsMade: job?.attemptsMade,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      { stage: worker.name, jobId: job.id, fileId: job.data.fileId, durationMs },
      "Worker job completed",
    );
  });

  const shutdown = async () => {
    logger.info("Worker shutting down");
    await worker.close();
    await runtime.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
