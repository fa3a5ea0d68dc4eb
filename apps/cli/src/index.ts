import { runCli } from './cli.js';
import { createCliLogger } from './observability/logger.js';

const logger = createCliLogger();

process.exitCode = await runCli(process.argv.slice(2), process.env, logger);
