#!/usr/bin/env node
/**
 * CLI entrypoint for capacity-ingest.
 *
 * Usage:
 *   capacity-ingest                      # one full run
 *   capacity-ingest --continuous --interval 6
 *   capacity-ingest --test-db
 */
import { parseArgs } from "node:util";
import { CapacityIngest, loadConfigFromEnv } from "./index.js";
import { errorMessage } from "./core/exceptions.js";
import { createLogger } from "./logger.js";

const USAGE = `
capacity-ingest — download, validate and load capacity snapshots

Usage:
  capacity-ingest [options]

Options:
  --skip-download        Only validate and upload files already on disk
  --skip-upload          Download and validate, but do not touch the database
  --continuous           Run now, then repeat every --interval hours
  --interval <hours>     Hours between runs in continuous mode (default: 6)
  --test-db              Check database connectivity and exit
  --days-back <n>        Gas days before today to fetch (default: 2)
  --data-dir <dir>       Snapshot directory (default: $DATA_DIR or ./data)
  --help                 Show this help

Database settings come from DB_PROVIDER, DB_HOST, DB_NAME, DB_USER,
DB_PASSWORD, DB_PORT (or SQLITE_PATH for DB_PROVIDER=sqlite).
`.trim();

function parseCli() {
  try {
    return parseArgs({
      args: process.argv.slice(2),
      options: {
        "skip-download": { type: "boolean", default: false },
        "skip-upload": { type: "boolean", default: false },
        continuous: { type: "boolean", default: false },
        interval: { type: "string" },
        "test-db": { type: "boolean", default: false },
        "days-back": { type: "string" },
        "data-dir": { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
    }).values;
  } catch (err) {
    console.error(`${errorMessage(err)}\n\n${USAGE}`);
    process.exit(2);
  }
}

const values = parseCli();

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const env = { ...process.env };
if (values["data-dir"] !== undefined) env.DATA_DIR = values["data-dir"];
if (values["days-back"] !== undefined) env.DAYS_BACK = values["days-back"];
if (values.interval !== undefined) env.SCHEDULE_INTERVAL_HOURS = values.interval;

let setup: ReturnType<typeof CapacityIngest.fromConfig>;
try {
  setup = CapacityIngest.fromConfig(loadConfigFromEnv(env));
} catch (err) {
  // LOG_LEVEL itself may be the invalid setting.
  createLogger().fatal({ err: errorMessage(err) }, "configuration error");
  process.exit(1);
}
const { ingest, config } = setup;
const log = createLogger(config.logLevel);

let exitCode = 0;
try {
  if (values["test-db"]) {
    await ingest.checkConnection();
    console.log("Database connection successful.");
  } else if (values.continuous) {
    const controller = new AbortController();
    for (const sig of ["SIGINT", "SIGTERM"] as const) {
      process.once(sig, () => controller.abort());
    }
    await ingest.runForever({
      intervalHours: config.pipeline.intervalHours,
      signal: controller.signal,
      run: {
        skipDownload: values["skip-download"],
        skipUpload: values["skip-upload"],
      },
    });
  } else {
    const summary = await ingest.runOnce({
      skipDownload: values["skip-download"],
      skipUpload: values["skip-upload"],
    });
    console.log(
      `Downloaded ${summary.downloaded}, valid ${summary.valid}, invalid ${summary.invalid}, ` +
        `uploaded ${summary.uploaded} (${summary.rowsAppended} rows)`,
    );
  }
} catch (err) {
  log.fatal({ err: errorMessage(err) }, "run failed");
  exitCode = 1;
} finally {
  await ingest.close();
}

process.exit(exitCode);
