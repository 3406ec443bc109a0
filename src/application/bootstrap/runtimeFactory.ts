import type { NewsProviderPort } from "../../core/ports/inboundPorts";
import type {
  AnalysisRepositoryPort,
  DocumentRepositoryPort,
} from "../../core/ports/outboundPorts";
import { createDb } from "../../infra/db/client";
import {
  PostgresAnalysisRepository,
  PostgresDocumentRepository,
} from "../../infra/db/repositories";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { PdfjsTextLayer } from "../../infra/pdf/pdfjsTextLayer";
import { FinnhubNewsProvider } from "../../infra/providers/finnhub/finnhubNewsProvider";
import { MockNewsProvider } from "../../infra/providers/mocks/mockNewsProvider";
import { BullMqQueue } from "../../infra/queue/bullMqQueue";
import {
  InMemoryAnalysisRepository,
  InMemoryDocumentRepository,
} from "../../infra/storage/inMemoryRepositories";
import {
  AnalysisJobFactory,
  SystemClock,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import { env, toAnalysisConfig } from "../../shared/config/env";
import { DocumentService } from "../services/documentService";
import { InsightService } from "../services/insightService";

export const redisConfigFromUrl = (url: string) => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
  };
};

const createNewsProvider = (): NewsProviderPort => {
  if (env.NEWS_PROVIDER === "finnhub") {
    return new FinnhubNewsProvider(
      env.FINNHUB_BASE_URL,
      env.FINNHUB_API_KEY,
      env.FINNHUB_TIMEOUT_MS,
      new HttpJsonClient({ minIntervalMs: env.FINNHUB_MIN_INTERVAL_MS }),
    );
  }

  return new MockNewsProvider();
};

type Repositories = {
  documents: DocumentRepositoryPort;
  analyses: AnalysisRepositoryPort;
  close: () => Promise<void>;
};

const createRepositories = (clock: SystemClock): Repositories => {
  if (env.DOCUMENT_STORE === "memory") {
    return {
      documents: new InMemoryDocumentRepository(),
      analyses: new InMemoryAnalysisRepository(),
      close: async () => {},
    };
  }

  const { db, sql } = createDb(env.POSTGRES_URL);
  return {
    documents: new PostgresDocumentRepository(db),
    analyses: new PostgresAnalysisRepository(db, clock),
    close: async () => {
      await sql.end();
    },
  };
};

export type RuntimeOptions = {
  /** Connect the BullMQ queue; needed to enqueue jobs or report queue status. */
  withQueue?: boolean;
};

/**
 * Centralizes runtime wiring so the CLI and the worker share one composition root.
 */
export const createRuntime = (options: RuntimeOptions = {}) => {
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const jobFactory = new AnalysisJobFactory(clock, ids);
  const textLayer = new PdfjsTextLayer();
  const repositories = createRepositories(clock);
  const queue = options.withQueue
    ? new BullMqQueue(redisConfigFromUrl(env.REDIS_URL))
    : undefined;

  const insightService = new InsightService(
    repositories.documents,
    textLayer,
    clock,
    toAnalysisConfig(env),
    repositories.analyses,
  );
  const documentService = new DocumentService(
    repositories.documents,
    textLayer,
    insightService,
    clock,
    ids,
    repositories.analyses,
    queue,
    jobFactory,
  );

  return {
    clock,
    queue,
    insightService,
    documentService,
    newsProvider: createNewsProvider(),
    close: async () => {
      await queue?.close();
      await repositories.close();
    },
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
