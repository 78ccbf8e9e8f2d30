import type { AdmissionStateName, InitOutcome, LoggingConfig } from '../core/types.js';
import { getLogger } from '../utils/logging.js';
import { initializationsTotal } from '../metrics/index.js';

export type ApplyConfig = (config: LoggingConfig) => void | Promise<void>;

/**
 * Admits at most one configuration into the global logging facility.
 *
 * uninitialized -> initializing -> initialized. The first caller to find the
 * guard uninitialized moves it to initializing in the same tick and applies its
 * config; everyone arriving meanwhile waits on the barrier. The guard only
 * reports initialized once the apply step has resolved. A failed apply puts the
 * guard back to uninitialized so a corrected config can be retried.
 */
export class AdmissionGuard {
  private current: AdmissionStateName = 'uninitialized';
  private barrier: Promise<void> | null = null;
  private installed: LoggingConfig | null = null;
  private readonly initialized: Promise<void>;
  private markInitialized: () => void = () => {};

  constructor(private readonly applyConfig: ApplyConfig) {
    this.initialized = new Promise((resolve) => {
      this.markInitialized = resolve;
    });
  }

  get state(): AdmissionStateName {
    return this.current;
  }

  /** The config that won initialization, or null before that. */
  get appliedConfig(): LoggingConfig | null {
    return this.installed;
  }

  /** Resolves once the facility is initialized (immediately if it already is). */
  whenInitialized(): Promise<void> {
    return this.initialized;
  }

  async initOnce(config: LoggingConfig): Promise<InitOutcome> {
    for (;;) {
      if (this.current === 'initialized') {
        initializationsTotal.inc({ result: 'skipped' });
        return 'skipped';
      }
      if (this.barrier) {
        await this.barrier;
        continue;
      }
      return this.initialize(config);
    }
  }

  private async initialize(config: LoggingConfig): Promise<InitOutcome> {
    this.current = 'initializing';
    let openBarrier: () => void = () => {};
    this.barrier = new Promise((resolve) => {
      openBarrier = resolve;
    });
    try {
      await this.applyConfig(config);
      this.installed = config;
      this.current = 'initialized';
      this.markInitialized();
      initializationsTotal.inc({ result: 'applied' });
      getLogger().debug({ targets: Object.keys(config.targetLevels) }, 'logging facility initialized');
      return 'applied';
    } catch (err) {
      this.current = 'uninitialized';
      initializationsTotal.inc({ result: 'failed' });
      getLogger().warn({ err }, 'logging facility rejected configuration');
      throw err;
    } finally {
      this.barrier = null;
      openBarrier();
    }
  }
}
