// src/jobs/purge.job.ts
import { PasteService } from '../services/paste.service';

/**
 * Periodically removes expired pastes. Runs never overlap; a disabled
 * interval (0) returns a no-op stopper.
 */
export const startPurgeJob = (pastes: PasteService, intervalMs: number): (() => void) => {
  if (intervalMs <= 0) {
    console.log('Purge job disabled');
    return () => undefined;
  }

  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      console.log('Purge: previous run still in progress, skipping');
      return;
    }
    running = true;
    try {
      await pastes.purgeExpired();
    } catch (error) {
      console.error('Purge failed:', error);
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
};
