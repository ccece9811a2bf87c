/**
 * Command-line entry point.
 *
 * Usage: npm run discharge -- run [patientId]
 * Env:   see config.ts (LLM_ENABLED, STORAGE_DRIVER, OUTPUT_DIR, ...)
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createRuntime } from './bootstrap.js';
import { USAGE, formatReport, parseCliArgs } from './cli/report.js';

async function main(argv: readonly string[]): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (command.kind === 'error') {
    console.error(`${command.message}\n\n${USAGE}`);
    return 1;
  }

  const config = loadConfig();
  // Keep engine logs out of the report unless asked for
  const logger = createLogger(process.env.LOG_LEVEL ? config.logLevel : 'warn');
  const runtime = createRuntime(config, logger);

  try {
    const { decision, checkResults, artifacts } = await runtime.orchestrator.runDischargeVerification(
      command.patientId,
    );

    await mkdir(config.storage.outputDir, { recursive: true });
    const outputPath = join(config.storage.outputDir, `final_decision_${command.patientId}.json`);
    await writeFile(outputPath, JSON.stringify(decision, null, 2), 'utf8');

    console.log(formatReport(decision, checkResults, [...artifacts, outputPath]));
    return decision.approved ? 0 : 1;
  } finally {
    await runtime.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Discharge verification failed:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
