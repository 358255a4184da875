/**
 * Throttled progress lines for long fetches and pushes, enabled by git's
 * `option progress true`. Lines go to stderr next to git's own progress.
 */

import type { LogSink } from '../util/logger.js';

export type ProgressPhase = 'history' | 'content' | 'push';

export interface ProgressStats {
  phase: ProgressPhase;
  processed: number;
  total: number;
  startTime: number;
}

export interface ProgressReporter {
  update(stats: ProgressStats): void;
  summary(message: string): void;
}

const PHASE_LABELS: Record<ProgressPhase, string> = {
  history: 'Fetching history',
  content: 'Fetching revisions',
  push: 'Pushing commits'
};

export const silentProgress: ProgressReporter = {
  update: () => undefined,
  summary: () => undefined
};

export function createProgressReporter(
  enabled: boolean,
  sink: LogSink = (line) => process.stderr.write(line),
  intervalMs = 1000
): ProgressReporter {
  if (!enabled) return silentProgress;
  let lastUpdate = 0;

  return {
    update(stats: ProgressStats): void {
      const now = Date.now();
      const finished = stats.processed >= stats.total;
      // Throttle, but always report completion
      if (!finished && now - lastUpdate < intervalMs) return;
      lastUpdate = now;

      const percentage = stats.total > 0 ? Math.round((stats.processed / stats.total) * 100) : 100;
      const elapsed = Math.round((now - stats.startTime) / 1000);
      sink(`dokuwiki: ${PHASE_LABELS[stats.phase]}: ${percentage}% (${stats.processed}/${stats.total}), ${elapsed}s\n`);
    },

    summary(message: string): void {
      sink(`dokuwiki: ${message}\n`);
    }
  };
}
