import { SubscriberId, SubscriberSettings } from "../core/types.js";

interface SubscriberState {
  addresses: string[];
  settings: SubscriberSettings;
}

export interface WatchEntry {
  subscriber: SubscriberId;
  addresses: string[];
}

const DEFAULT_SETTINGS: SubscriberSettings = {
  hideZeroBalances: false,
  autoSnipe: false
};

/**
 * Watch-lists and settings shared between the chat commands and the loops.
 * Readers always receive copies, so a loop iterating a snapshot is unaffected
 * by a command replacing the list mid-tick.
 */
export class SubscriberRegistry {
  private readonly subscribers = new Map<SubscriberId, SubscriberState>();
  private readonly listeners: Array<(subscriber: SubscriberId, addresses: string[]) => void> = [];

  setWatchList(subscriber: SubscriberId, addresses: readonly string[]): string[] {
    const unique = [...new Map(addresses.map((address) => [address.toLowerCase(), address])).values()];
    this.ensure(subscriber).addresses = unique;
    for (const listener of this.listeners) {
      listener(subscriber, [...unique]);
    }
    return [...unique];
  }

  onWatchListChange(listener: (subscriber: SubscriberId, addresses: string[]) => void): void {
    this.listeners.push(listener);
  }

  setAutoSnipe(subscriber: SubscriberId, enabled: boolean): void {
    this.ensure(subscriber).settings.autoSnipe = enabled;
  }

  setHideZeroBalances(subscriber: SubscriberId, enabled: boolean): void {
    this.ensure(subscriber).settings.hideZeroBalances = enabled;
  }

  getSettings(subscriber: SubscriberId): SubscriberSettings {
    const state = this.subscribers.get(subscriber);
    return { ...(state?.settings ?? DEFAULT_SETTINGS) };
  }

  getWatchList(subscriber: SubscriberId): string[] {
    return [...(this.subscribers.get(subscriber)?.addresses ?? [])];
  }

  snapshotWatchLists(): WatchEntry[] {
    const entries: WatchEntry[] = [];
    for (const [subscriber, state] of this.subscribers) {
      if (state.addresses.length > 0) {
        entries.push({ subscriber, addresses: [...state.addresses] });
      }
    }
    return entries;
  }

  autoSnipeSubscribers(): SubscriberId[] {
    return [...this.subscribers.entries()]
      .filter(([, state]) => state.settings.autoSnipe)
      .map(([subscriber]) => subscriber);
  }

  private ensure(subscriber: SubscriberId): SubscriberState {
    let state = this.subscribers.get(subscriber);
    if (!state) {
      state = { addresses: [], settings: { ...DEFAULT_SETTINGS } };
      this.subscribers.set(subscriber, state);
    }
    return state;
  }
}
