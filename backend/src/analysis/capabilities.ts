import { CapabilityUnavailableError, errorMessage } from '../errors';
import {
  Capability,
  CapabilityStatus,
  RatingEnsemble,
  ZeroShotClassifier,
} from '../types';
import { withTimeout } from '../utils/async';
import { logger as rootLogger, Logger } from '../utils/logger';

export type CapabilityProviders = {
  ratingEnsemble?: RatingEnsemble;
  zeroShotClassifier?: ZeroShotClassifier;
};

type CapabilityHandleOptions = {
  loadTimeoutMs: number;
  logger?: Logger;
};

/**
 * Process-wide view of the ML capabilities. `init()` probes every provider
 * once and caches the outcome; later calls return the same status. Providers
 * that failed to load are never handed out.
 */
export class CapabilityHandle {
  private initialization?: Promise<CapabilityStatus>;
  private current: CapabilityStatus = {
    ratingEnsemble: false,
    zeroShotClassifier: false,
  };
  private readonly log: Logger;

  constructor(
    private readonly providers: CapabilityProviders,
    private readonly options: CapabilityHandleOptions,
  ) {
    this.log = options.logger ?? rootLogger.child('capabilities');
  }

  init(): Promise<CapabilityStatus> {
    if (!this.initialization) {
      this.initialization = this.probe();
    }
    return this.initialization;
  }

  get status(): CapabilityStatus {
    return { ...this.current };
  }

  get ratingEnsemble(): RatingEnsemble | undefined {
    return this.current.ratingEnsemble ? this.providers.ratingEnsemble : undefined;
  }

  get zeroShotClassifier(): ZeroShotClassifier | undefined {
    return this.current.zeroShotClassifier
      ? this.providers.zeroShotClassifier
      : undefined;
  }

  async teardown(): Promise<void> {
    const pending = this.initialization;
    this.initialization = undefined;
    if (pending) await pending;

    const loaded: Capability[] = [];
    if (this.ratingEnsemble) loaded.push(this.ratingEnsemble);
    if (this.zeroShotClassifier) loaded.push(this.zeroShotClassifier);
    this.current = { ratingEnsemble: false, zeroShotClassifier: false };

    await Promise.all(
      loaded.map(async (capability) => {
        if (!capability.unload) return;
        await capability.unload();
        this.log.info(`${capability.name} unloaded`);
      }),
    );
  }

  private async probe(): Promise<CapabilityStatus> {
    const [ratingEnsemble, zeroShotClassifier] = await Promise.all([
      this.tryLoad(this.providers.ratingEnsemble),
      this.tryLoad(this.providers.zeroShotClassifier),
    ]);
    this.current = { ratingEnsemble, zeroShotClassifier };
    return this.status;
  }

  private async tryLoad(capability?: Capability): Promise<boolean> {
    if (!capability) return false;
    try {
      await withTimeout(
        capability.load(),
        this.options.loadTimeoutMs,
        capability.name,
      );
      this.log.info(`${capability.name} loaded`);
      return true;
    } catch (err) {
      const failure =
        err instanceof CapabilityUnavailableError
          ? err
          : new CapabilityUnavailableError(capability.name, errorMessage(err));
      this.log.warn(
        `${capability.name} unavailable (${failure.message}); keyword analysis will be used instead`,
      );
      return false;
    }
  }
}
