#!/usr/bin/env tsx

import { Command } from 'commander';
import * as path from 'path';
import type { Logger } from 'pino';
import { BuildError, ConfigError, ServerError, ShutdownError } from '@vmboot/core';
import { IsoBuilder, IsoImageReader } from '@vmboot/iso-builder';
import { ConfigImageServer } from './app';
import { loadConfig } from './config';
import { createLogger } from './logger';

const program = new Command();

program
  .name('vmedia-boot')
  .description('Build a configuration image, serve it and boot a server from it over Redfish virtual media')
  .version('0.1.0');

program
  .command('start', { isDefault: true })
  .description('Build the image, start the media server and run the boot sequence')
  .option('-p, --port <port>', 'Listen port (PORT)')
  .option('-d, --data-dir <path>', 'Data directory (DATA_DIR)')
  .option('-s, --source <dir>', 'Directory to package into the image (IMAGE_SOURCE_DIR)')
  .option('-b, --bmc <url>', 'Management endpoint including the system path (BMC_ADDRESS)')
  .action(async (options: { port?: string; dataDir?: string; source?: string; bmc?: string }) => {
    let logger = createLogger('info');
    try {
      const { config, warnings } = loadConfig({
        ...process.env,
        PORT: options.port ?? process.env.PORT,
        DATA_DIR: options.dataDir ?? process.env.DATA_DIR,
        IMAGE_SOURCE_DIR: options.source ?? process.env.IMAGE_SOURCE_DIR,
        BMC_ADDRESS: options.bmc ?? process.env.BMC_ADDRESS,
      });
      logger = createLogger(config.logLevel);
      for (const warning of warnings) logger.warn(warning);

      const app = new ConfigImageServer(config, { logger });
      installSignalHandlers(app, logger);

      const result = await app.start();
      if (app.stopRequested) return;
      logger.info({ url: result.serverURL, image: result.imageURL }, 'Media server is running. Press Ctrl+C to stop.');
    } catch (error) {
      exitOnStartupError(logger, error);
    }
  });

program
  .command('build <dir> <output>')
  .description('Package a directory into an ISO9660 image')
  .option('-l, --label <label>', 'Volume label', 'test-config')
  .action(async (dir: string, output: string, options: { label: string }) => {
    const logger = createLogger(process.env.LOG_LEVEL ?? 'info');
    try {
      const builder = new IsoBuilder({ logger });
      await builder.create(path.resolve(output), path.resolve(dir), options.label);
      logger.info({ output, label: options.label }, 'Image written');
    } catch (error) {
      exitOnStartupError(logger, error);
    }
  });

program
  .command('inspect <image>')
  .description('List the volume label and contents of an image')
  .action(async (image: string) => {
    const reader = await IsoImageReader.open(path.resolve(image));
    console.log(`Volume:     ${reader.volumeIdentifier}`);
    console.log(`Sectors:    ${reader.volumeSpaceSize}`);
    console.log(`Rock Ridge: ${reader.rockRidge ? 'yes' : 'no'}`);
    for (const entry of reader.list()) {
      const mode = entry.mode === undefined ? '----' : (entry.mode & 0o7777).toString(8).padStart(4, '0');
      const size = entry.kind === 'directory' ? '-' : String(entry.size);
      console.log(`${mode} ${size.padStart(10)} ${entry.path}${entry.kind === 'directory' ? '/' : ''}`);
    }
  });

function installSignalHandlers(app: ConfigImageServer, logger: Logger): void {
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down...');
    app.stop().then(
      () => {
        logger.info('Server terminated gracefully');
        process.exit(0);
      },
      (error: unknown) => {
        logger.fatal({ err: error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function exitOnStartupError(logger: Logger, error: unknown): never {
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, 'Invalid configuration');
  } else if (error instanceof BuildError) {
    logger.fatal({ err: error, kind: error.kind }, 'Failed to build image');
  } else if (error instanceof ServerError || error instanceof ShutdownError) {
    logger.fatal({ err: error }, 'Media server failed');
  } else {
    logger.fatal({ err: error }, 'Unexpected failure');
  }
  process.exit(1);
}

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
