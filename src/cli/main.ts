import { readFile } from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import type { AnalysisFailure } from "../core/entities/appError";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatAnalysisReport } from "./analysisReport";

const DAY_MS = 24 * 60 * 60 * 1000;
const NEWS_LIMIT = 20;

class CommandFailure extends Error {
  constructor(readonly failure: AnalysisFailure) {
    super(failure.message);
    this.name = "CommandFailure";
  }
}

/**
 * Runs one command against a fresh runtime and releases its connections afterwards.
 */
const withRuntime = async (
  options: { withQueue?: boolean },
  use: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = createRuntime(options);
  try {
    await use(runtime);
  } finally {
    await runtime.close();
  }
};

const printJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

/**
 * Defines a single command surface for intake, analysis and operational checks.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("prospectus-insight")
    .description("Extract KPIs and an MDA summary from prospectus PDFs");

  cli
    .command("submit")
    .description("Validate and store a PDF, printing its file id")
    .requiredOption("--file <path>", "Path to the prospectus PDF")
    .option("--enqueue", "Queue a background analysis for the worker")
    .action(async (opts: { file: string; enqueue?: boolean }) => {
      await withRuntime({ withQueue: Boolean(opts.enqueue) }, async (runtime) => {
        const content = new Uint8Array(await readFile(opts.file));
        const stored = await runtime.documentService.submitDocument(
          content,
          path.basename(opts.file),
          { enqueue: Boolean(opts.enqueue) },
        );
        if (stored.isErr()) {
          throw new CommandFailure(stored.error);
        }

        printJson({
          fileId: stored.value.fileId,
          fileName: stored.value.fileName,
          pageCount: stored.value.pageCount,
          byteSize: stored.value.byteSize,
        });
      });
    });

  cli
    .command("analyze")
    .description("Analyze a stored document")
    .requiredOption("--file-id <id>", "File id returned by submit")
    .option("--prettify", "Render a human-friendly report")
    .action(async (opts: { fileId: string; prettify?: boolean }) => {
      await withRuntime({}, async (runtime) => {
        const analysis = await runtime.insightService.analyze(opts.fileId);
        if (analysis.isErr()) {
          throw new CommandFailure(analysis.error);
        }

        if (opts.prettify) {
          console.log(formatAnalysisReport(analysis.value));
        } else {
          printJson(analysis.value);
        }
      });
    });

  cli
    .command("analyze-file")
    .description("Submit and analyze a PDF in one step")
    .requiredOption("--file <path>", "Path to the prospectus PDF")
    .option("--prettify", "Render a human-friendly report")
    .action(async (opts: { file: string; prettify?: boolean }) => {
      await withRuntime({}, async (runtime) => {
        const content = new Uint8Array(await readFile(opts.file));
        const stored = await runtime.documentService.submitDocument(
          content,
          path.basename(opts.file),
        );
        if (stored.isErr()) {
          throw new CommandFailure(stored.error);
        }

        const analysis = await runtime.insightService.analyze(stored.value.fileId);
        if (analysis.isErr()) {
          throw new CommandFailure(analysis.error);
        }

        if (opts.prettify) {
          console.log(formatAnalysisReport(analysis.value));
        } else {
          printJson(analysis.value);
        }
      });
    });

  cli
    .command("summary")
    .description("Print the extractive MDA summary of a stored document")
    .requiredOption("--file-id <id>", "File id returned by submit")
    .action(async (opts: { fileId: string }) => {
      await withRuntime({}, async (runtime) => {
        const summary = await runtime.insightService.getSummary(opts.fileId);
        if (summary.isErr()) {
          throw new CommandFailure(summary.error);
        }

        console.log(summary.value.summary);
      });
    });

  cli
    .command("delete")
    .description("Remove a stored document and its analysis")
    .requiredOption("--file-id <id>", "File id returned by submit")
    .action(async (opts: { fileId: string }) => {
      await withRuntime({}, async (runtime) => {
        const removed = await runtime.documentService.deleteDocument(opts.fileId);
        if (!removed) {
          throw new CommandFailure({
            code: "document_not_found",
            stage: "storage",
            message: `No document stored under '${opts.fileId}'`,
          });
        }

        logger.info({ fileId: opts.fileId }, "Document removed");
      });
    });

  cli
    .command("news")
    .description("Fetch recent company news for market context")
    .requiredOption("--symbol <symbol>", "Ticker symbol")
    .action(async (opts: { symbol: string }) => {
      await withRuntime({}, async (runtime) => {
        const to = runtime.clock.now();
        const items = await runtime.newsProvider.fetchArticles({
          symbol: opts.symbol,
          from: new Date(to.getTime() - env.NEWS_LOOKBACK_DAYS * DAY_MS),
          to,
          limit: NEWS_LIMIT,
        });
        if (items.isErr()) {
          logger.error(
            {
              provider: items.error.provider,
              code: items.error.code,
              httpStatus: items.error.httpStatus,
              retryable: items.error.retryable,
            },
            items.error.message,
          );
          process.exitCode = 1;
          return;
        }

        items.value.forEach((item) => {
          console.log(`${item.publishedAt.toISOString()} [${item.provider}] ${item.title}`);
          if (item.url) {
            console.log(`  ${item.url}`);
          }
        });
      });
    });

  cli
    .command("status")
    .description("Report runtime configuration and queue backlog")
    .action(async () => {
      await withRuntime({ withQueue: true }, async (runtime) => {
        const queueCounts = await runtime.queue?.getQueueCounts();

        logger.info(
          {
            documentStore: env.DOCUMENT_STORE,
            newsProvider: env.NEWS_PROVIDER,
            redis: env.REDIS_URL,
            postgres: env.POSTGRES_URL,
            queueCounts,
            startupWorkflow: [
              "start Postgres and Redis (POSTGRES_URL, REDIS_URL)",
              "npm run worker",
              "npm start -- submit --file <prospectus.pdf> --enqueue",
            ],
            troubleshooting: [
              "DOCUMENT_STORE=memory keeps documents for one process only; use analyze-file or DOCUMENT_STORE=postgres.",
              "Scanned PDFs without a text layer produce no KPIs and no summary.",
            ],
          },
          "Runtime status",
        );
      });
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommandFailure) {
      logger.error(
        { code: error.failure.code, stage: error.failure.stage },
        error.failure.message,
      );
      process.exitCode = 1;
      return;
    }

    throw error;
  }
};
