#!/usr/bin/env tsx

import { Command } from "commander";
import { loadConfig, PASSWORD_ENV } from "../lib/config";
import { createLogger } from "../lib/logging";
import { HttpLimsClient } from "../lib/lims/lims-client";
import { Notifier } from "../lib/notifier";
import { SequenceBundlePipeline } from "../lib/seqbundle";
import { logSummary } from "../lib/processing-result";
import { errorMessage, SeqbundleError } from "../lib/seqbundle-errors";

const program = new Command();

program
  .name("seqbundle")
  .description(
    "Groups the sequencing files of a step by project, creates a zip file per project and publishes it to the project",
  )
  .requiredOption("-s, --step-uri <uri>", "URI of the step to process")
  .option("-u, --username <name>", "LIMS API username", "apiuser")
  .option(
    "-p, --password <password>",
    `LIMS API password (default: from the ${PASSWORD_ENV} environment variable)`,
  )
  .option("-b, --base-uri <uri>", "LIMS base URI (default: taken from the step URI)")
  .option(
    "-a, --archive <location>",
    "read the archive from this path or s3:// URI instead of the step",
  )
  .option("-l, --log-file <path>", "also write a debug log here")
  .option("--concurrency <n>", "artifacts to resolve at once", "4")
  .option("--timeout <ms>", "LIMS request timeout", "30000")
  .option("--send-emails", "email project researchers when files are published", false)
  .option("--smtp-host <host>", "SMTP server for emails", "localhost")
  .option("--smtp-port <port>", "SMTP port for emails", "25")
  .option("--email-from <address>", "From address for emails", "noreply@localhost");

program.parse();

async function main(): Promise<number> {
  const config = loadConfig(program.opts());

  const logger = createLogger({ logFile: config.logFile });

  logger.info("=".repeat(80));
  logger.info("Sequencing File Bundler - Starting");
  logger.info(`Step URI: ${config.stepUri}`);
  logger.info("=".repeat(80));

  try {
    const lims = new HttpLimsClient(
      {
        baseUri: config.baseUri,
        username: config.username,
        password: config.password,
        timeoutMs: config.timeoutMs,
      },
      logger,
    );

    const pipeline = new SequenceBundlePipeline(lims, logger, {
      archive: config.archive,
      concurrency: config.concurrency,
      notifier: new Notifier(
        lims,
        {
          sendEmails: config.sendEmails,
          smtpHost: config.smtpHost,
          smtpPort: config.smtpPort,
          from: config.emailFrom,
        },
        logger,
      ),
    });

    const result = await pipeline.run(config.stepUri);

    logSummary(logger, result);

    return result.success ? 0 : 1;
  } catch (e) {
    logger.error(`Fatal error: ${errorMessage(e)}`);

    if (e instanceof SeqbundleError)
      for (const s of e.specifics) logger.error(`  - ${s.message}`);

    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    // only configuration problems get here - before there is a logger
    console.error(errorMessage(e));

    if (e instanceof SeqbundleError)
      for (const s of e.specifics) console.error(`  - ${s.message}`);

    process.exitCode = 1;
  },
);
