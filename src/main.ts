// imports
import dotenv from 'dotenv';
dotenv.config();

import { addAbortSignal } from 'node:stream';
import { loadConfig } from './config/load.ts';
import { PublisherFactory } from './publishers/publisher-factory.ts';
import { lineAlignedChunks } from './sources/line-chunks.ts';
import { log } from './utils/logger.ts';

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === 'AbortError';

async function main() {
  // load config
  const appCfg = await loadConfig(process.argv[2]);

  // create publisher; nothing is initialized until the first chunk arrives
  const publisher = PublisherFactory.create(appCfg.publisherConfig);

  // stop reading on a signal, then flush whatever was already accepted
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.warn(`Received ${signal}, flushing and shutting down`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  process.stdin.setEncoding('utf8');
  const input = addAbortSignal(controller.signal, process.stdin);

  try {
    for await (const chunk of lineAlignedChunks(input)) {
      await publisher.write(chunk);
    }
  } catch (error) {
    if (!isAbortError(error)) throw error;
  } finally {
    await publisher.close();
  }
}

main().catch((error: unknown) => {
  log.fatal('logship exited with an error', { error });
  process.exit(1);
});
