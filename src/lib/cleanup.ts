import { container } from '@sapphire/framework';
import { PRICE_CONFIG, VOICE_CONFIG } from '../constants.js';

const SWEEP_INTERVAL_MS = 60 * 1000;
const PRUNE_INTERVAL_MS = 24 * 60 * 60 * 1000;

/**
 * Run `job` every `intervalMs`; failures are logged and the schedule continues
 */
function every(name: string, intervalMs: number, job: () => Promise<void>): NodeJS.Timeout {
  const timer = setInterval(async () => {
    try {
      await job();
    } catch (error) {
      container.logger.error(`Background job failed (${name}):`, error);
    }
  }, intervalMs);
  timer.unref();
  return timer;
}

/**
 * Start background jobs
 * - Session sweep: expires sessions whose timers were lost (every minute)
 * - Price recompute: refreshes the reference price (every 15 minutes)
 * - Voice rewards: pays users in voice channels (every minute)
 * - Store prune: deletes expired daily counters (daily)
 *
 * @returns Stops every job
 */
export function startBackgroundJobs(): () => void {
  const timers = [
    every('session sweep', SWEEP_INTERVAL_MS, async () => {
      await container.gameStateService.sweep();
    }),
    every('price recompute', PRICE_CONFIG.RECOMPUTE_INTERVAL_MINUTES * 60 * 1000, async () => {
      await container.priceService.recompute();
    }),
    every('voice rewards', VOICE_CONFIG.TICK_INTERVAL_MS, async () => {
      const paid = await container.voiceRewardService.tick();
      if (paid > 0) {
        container.logger.debug(`Voice rewards: paid ${paid} credits`);
      }
    }),
    every('store prune', PRUNE_INTERVAL_MS, async () => {
      const pruned = await container.kvStore.pruneExpired();
      if (pruned > 0) {
        container.logger.info(`Cleanup job: Pruned ${pruned} expired store entries`);
      }
    }),
  ];

  container.logger.info('🧹 Background jobs started (sweep, prices, voice rewards, prune)');
  return () => timers.forEach((timer) => clearInterval(timer));
}
