import { Logger } from "../core/logger.js";
import { Notifier } from "../core/telegramNotifier.js";
import { ActivityRecord, SubscriberId, WalletActivityEvent } from "../core/types.js";
import { describeError } from "../rpc/errors.js";
import { CursorStore } from "../storage/cursorStore.js";
import { SubscriberRegistry } from "../storage/subscriberRegistry.js";

export interface TransferSource {
  fetchRecentTransfers(address: string): Promise<ActivityRecord[]>;
}

/**
 * Polls every watched (subscriber, address) pair and reports transfers newer
 * than the pair's cursor. Pairs are processed one after another.
 */
export class WalletWatcher {
  private readonly registry: SubscriberRegistry;
  private readonly cursors: CursorStore;
  private readonly source: TransferSource;
  private readonly notifier: Notifier;
  private readonly log: Logger;

  constructor(
    registry: SubscriberRegistry,
    cursors: CursorStore,
    source: TransferSource,
    notifier: Notifier,
    log: Logger
  ) {
    this.registry = registry;
    this.cursors = cursors;
    this.source = source;
    this.notifier = notifier;
    this.log = log;
  }

  async tick(): Promise<WalletActivityEvent[]> {
    const watchLists = this.registry.snapshotWatchLists();
    if (watchLists.length === 0) {
      return [];
    }

    const emitted: WalletActivityEvent[] = [];
    for (const { subscriber, addresses } of watchLists) {
      for (const address of addresses) {
        let records: ActivityRecord[];
        try {
          records = await this.source.fetchRecentTransfers(address);
        } catch (error) {
          this.log.warn({ subscriber, address, error: describeError(error) }, "Transfer fetch failed, skipping");
          continue;
        }

        // The watch list may have changed while the fetch was in flight.
        if (!this.isWatched(subscriber, address)) {
          this.log.debug({ subscriber, address }, "Address unwatched during fetch, dropping result");
          continue;
        }

        const { events, cursor, seeded } = this.cursors.advance(subscriber, address, records);
        if (seeded) {
          this.log.debug({ subscriber, address, cursor }, "Seeded wallet cursor");
        }
        for (const record of events) {
          emitted.push({ subscriber, address, record });
          try {
            await this.notifier.notifyWalletActivity(subscriber, address, record);
          } catch (error) {
            this.log.warn({ subscriber, address, hash: record.hash, error: describeError(error) }, "Wallet notification failed");
          }
        }
      }
    }

    if (emitted.length > 0) {
      this.log.info({ events: emitted.length }, "Wallet activity reported");
    }
    return emitted;
  }

  private isWatched(subscriber: SubscriberId, address: string): boolean {
    const wanted = address.toLowerCase();
    return this.registry.getWatchList(subscriber).some((watched) => watched.toLowerCase() === wanted);
  }
}
