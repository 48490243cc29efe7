import chalk from 'chalk';
import { ArchiveStore, streamsFromConfig } from '../core/archive-store.js';
import { loadStoreConfig, stagingDirFor } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { ReceiverServer } from '../core/server.js';

export const serveCommand = async (options: { config: string; host?: string; port?: string }) => {
  try {
    const config = await loadStoreConfig(options.config);
    const streams = streamsFromConfig(config);
    const store = new ArchiveStore(streams);

    for (const stream of streams) {
      const limit = stream.budgetBytes > 0 ? `${config.streams[stream.name].max_size_gb} GB` : 'unlimited';
      console.log(chalk.dim(`[${stream.name}] Archive: ${stream.archivePath} (max ${limit}, ${stream.retention})`));
    }

    const server = new ReceiverServer(store, {
      host: options.host ?? config.host,
      port: options.port ? parseInt(options.port, 10) : config.port,
      stagingDir: stagingDirFor(config),
    });
    await server.start();
  } catch (err) {
    console.error(chalk.red(`\n[x] Receiver failed to start: ${errorMessage(err)}`));
    process.exitCode = 1;
  }
};
