import { getServices } from '@/lib/services';
import { BullAnalysisQueue } from './analysis-queue';

async function bootstrap() {
  const { queue, config } = await getServices();
  if (!(queue instanceof BullAnalysisQueue)) {
    throw new Error('REDIS_URL is not set; jobs run inside the web process and no worker is needed');
  }
  queue.registerProcessor();
  console.log(`[Queue] Worker ready (concurrency ${config.workerConcurrency})`);
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
