import 'dotenv/config';

import { closeLogger } from '@tilestep/logger';

import { loadConfig } from './config';
import { SERVICE_NAME, logger } from './logger';
import { startMetricsServer, type MetricsServerHandle } from './metrics-server';
import { runSession } from './run';

async function main() {
  const config = loadConfig();
  logger.info(
    {
      mode: config.mode,
      level: config.level.number,
      width: config.level.width,
      tickRate: config.tickRate,
      script: config.inputScript,
      progressPath: config.progressPath,
    },
    'Booting runner',
  );

  const controller = new AbortController();
  (['SIGINT', 'SIGTERM'] as const).forEach((signal) => {
    process.once(signal, () => {
      logger.warn({ signal }, 'Received shutdown signal');
      controller.abort();
    });
  });

  let metrics: MetricsServerHandle | null = null;
  if (config.metricsPort !== null) {
    metrics = await startMetricsServer(config.metricsPort);
  }

  try {
    const summary = await runSession(config, { signal: controller.signal });
    process.exitCode = summary.outcome === 'timeout' ? 1 : 0;
  } finally {
    await metrics?.close();
  }
}

main()
  .catch((error) => {
    logger.fatal({ err: error }, 'Runner failed');
    process.exitCode = 1;
  })
  .then(() => closeLogger(SERVICE_NAME))
  .catch((error) => {
    console.error('Failed to close runner logger', error);
    process.exitCode = 1;
  });
