import { AccountRef, BrokerClient, BrokerInstrument } from '@signalbridge/shared-types';
import { Logger } from '@signalbridge/shared-utils';
import { resolvePlatformName } from './InstrumentNormalizer';

const logger = new Logger('InstrumentCatalog');

interface CachedInstruments {
  instruments: BrokerInstrument[];
  fetchedAt: number;
}

/**
 * Per-account broker instrument list with a TTL cache
 */
export class InstrumentCatalog {
  private cache: Map<string, CachedInstruments> = new Map();

  constructor(
    private broker: BrokerClient,
    private ttlMs: number = 60 * 60 * 1000,
    private now: () => number = Date.now
  ) {}

  async list(account: AccountRef): Promise<BrokerInstrument[]> {
    const cached = this.cache.get(account.id);
    if (cached && this.now() - cached.fetchedAt < this.ttlMs) {
      return cached.instruments;
    }
    const instruments = await this.broker.listInstruments(account);
    this.cache.set(account.id, { instruments, fetchedAt: this.now() });
    logger.info(`[InstrumentCatalog] Loaded ${instruments.length} instrument(s) for account ${account.id}`);
    return instruments;
  }

  /**
   * Broker instrument for a canonical symbol, or null when the account has no such instrument
   */
  async resolve(account: AccountRef, canonical: string): Promise<BrokerInstrument | null> {
    const instruments = await this.list(account);
    const platformName = resolvePlatformName(
      canonical,
      instruments.map(instrument => instrument.name)
    );
    const instrument = instruments.find(candidate => candidate.name === platformName) ?? null;
    if (!instrument) {
      logger.warn(`[InstrumentCatalog] ${canonical} is not tradable on account ${account.id}`);
    }
    return instrument;
  }

  /**
   * Broker instrument by its platform name (as reported on positions)
   */
  async findByName(account: AccountRef, name: string): Promise<BrokerInstrument | null> {
    const instruments = await this.list(account);
    return instruments.find(instrument => instrument.name === name) ?? null;
  }

  invalidate(accountId?: string): void {
    if (accountId) {
      this.cache.delete(accountId);
    } else {
      this.cache.clear();
    }
  }
}
