import "dotenv/config";

import pino from "pino";

import { openDatabase } from "../lib/db.js";
import { readEnv } from "../lib/env.js";
import { buildExtensionReport, formatExtensionReport, parseReportArgs } from "../lib/reports.js";

const log = pino({ name: "extension-report" });

async function main(): Promise<void> {
  const options = parseReportArgs(process.argv.slice(2));
  const config = readEnv();
  const { db, close } = openDatabase(config.DATABASE_URL);

  try {
    const report = buildExtensionReport(db, options);
    console.log(formatExtensionReport(report).join("\n"));
  } finally {
    close();
  }
}

try {
  await main();
} catch (error) {
  log.error({ err: error }, "extension report failed");
  process.exitCode = 1;
}
