#!/usr/bin/env node
import { runHarvest } from '../core/index.js';
import { parseHarvestConfig } from '../utils/config.js';
import { DownloadError, handleError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { createProgram, toConfigInput, toJsonResult } from './program.js';
import type { CliOptions } from './types.js';

const INTERRUPTED_EXIT_CODE = 130;

/**
 * First Ctrl-C stops the run between units of work and still writes the
 * summary; a second one exits immediately
 */
function installInterruptHandler(controller: AbortController): () => void {
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    getLogger().warn('Interrupted, finishing the current step (press Ctrl-C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);
  return () => {
    process.off('SIGINT', onSigint);
  };
}

async function main(queryImage: string, options: CliOptions): Promise<void> {
  const logger = getLogger({ verbose: options.verbose, useStderr: options.json });
  const controller = new AbortController();
  const removeHandler = installInterruptHandler(controller);

  try {
    const config = parseHarvestConfig(toConfigInput(queryImage, options));
    logger.debug(`Output directory: ${config.outputDir}`);
    logger.debug(`Search page: ${config.searchUrl}`);

    const result = await runHarvest(config, { signal: controller.signal });
    const { feed, download, aborted } = result;

    if (options.json) {
      process.stdout.write(`${JSON.stringify(toJsonResult(result), null, 2)}\n`);
    } else {
      logger.summary({
        feed: { urls: feed.urls.size, scrolls: feed.scrollCount, reason: feed.reason },
        download: download.summary,
      });
    }

    if (aborted) {
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    if (download.summary.failed > 0) {
      const error = DownloadError.fromPartialDownload(download.summary.failed, download.summary.attempted);
      error.log();
      process.exit(error.getExitCode());
    }
    process.exit(0);
  } catch (error) {
    handleError(error);
  } finally {
    removeHandler();
  }
}

const program = createProgram(main);
program.parseAsync(process.argv).catch(handleError);
