#!/usr/bin/env node
import 'dotenv/config';
import logger, { errorMessage, setLogLevel } from './logger.js';
import { loadEnvFile, resolveSettings } from './config.js';
import { buildProgram, explicitOptions } from './program.js';
import { runTranslation } from './runner.js';
import { ConfigError } from './errors.js';

async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const cli = explicitOptions(program);

  try {
    loadEnvFile(typeof cli.envFile === 'string' ? cli.envFile : undefined);
    const settings = resolveSettings(cli);
    if (settings.debug) {
      setLogLevel('debug');
    }

    const { exitCode } = await runTranslation(settings);
    return exitCode;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 2;
    }
    logger.error('docrelay failed', { error: errorMessage(error) });
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Unhandled failure', { error: errorMessage(error) });
    process.exitCode = 1;
  }
);
