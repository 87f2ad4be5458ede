import { EventEmitter } from 'eventemitter3';
import { NodeAddress, VersionInfo, formatVersion } from '../types';
import { ServiceLogger, createLogger } from '../common/logger';
import {
  BridgePoolEvents,
  BridgeState,
  BridgeStats,
  ManagedBridgePool,
  StatsSubscription
} from './types';

/**
 * BridgeSelector - in-process pool of media bridges
 *
 * Tracks every bridge forwarded by the registry, keeps the latest load
 * statistics each bridge publishes, and picks the least loaded bridge for
 * a new conference.
 */
export class BridgeSelector extends EventEmitter<BridgePoolEvents> implements ManagedBridgePool {
  private bridges = new Map<NodeAddress, BridgeState>();
  private sequence = 0;
  private isRunning = false;
  private logger: ServiceLogger;

  constructor(
    private subscription: StatsSubscription,
    logger?: ServiceLogger
  ) {
    super();
    this.logger = logger ?? createLogger({ enableBridgeLogs: true });
  }

  init(): void {
    this.isRunning = true;
    this.logger.bridges('[BridgeSelector] Started');
  }

  dispose(): void {
    for (const address of this.bridges.keys()) {
      this.subscription.unsubscribe(address);
    }
    this.bridges.clear();
    this.isRunning = false;
    this.removeAllListeners();
    this.logger.bridges('[BridgeSelector] Stopped');
  }

  /**
   * Add a bridge, or refresh the version of one already known
   */
  add(address: NodeAddress, version?: VersionInfo): boolean {
    const existing = this.bridges.get(address);
    if (existing) {
      if (version) {
        existing.version = version;
      }
      return false;
    }

    const bridge: BridgeState = {
      address,
      version,
      stats: { conferenceCount: 0 },
      addedAt: this.sequence++
    };
    this.bridges.set(address, bridge);
    this.subscription.subscribe(address, stats => this.updateStats(address, stats));

    this.logger.bridges(
      `Added bridge ${address}${version ? ` running ${formatVersion(version)}` : ''}`
    );
    this.emit('bridge-added', bridge);
    return true;
  }

  remove(address: NodeAddress): boolean {
    if (!this.bridges.delete(address)) {
      return false;
    }
    this.subscription.unsubscribe(address);
    this.logger.bridges(`Removed bridge ${address}`);
    this.emit('bridge-removed', address);
    return true;
  }

  contains(address: NodeAddress): boolean {
    return this.bridges.has(address);
  }

  lookupVersion(address: NodeAddress): VersionInfo | undefined {
    return this.bridges.get(address)?.version;
  }

  /**
   * Record load statistics for a bridge. Updates for unknown bridges are dropped.
   */
  updateStats(address: NodeAddress, stats: BridgeStats): void {
    const bridge = this.bridges.get(address);
    if (!bridge) {
      this.logger.debug(`Ignoring stats for unknown bridge ${address}`);
      return;
    }
    bridge.stats = { ...stats };
    this.emit('stats-updated', bridge);
  }

  /**
   * Least loaded bridge by conference count, earliest added on a tie
   */
  selectBridge(exclude: Iterable<NodeAddress> = []): NodeAddress | undefined {
    const excluded = new Set(exclude);
    let selected: BridgeState | undefined;

    for (const bridge of this.bridges.values()) {
      if (excluded.has(bridge.address)) {
        continue;
      }
      if (
        !selected ||
        bridge.stats.conferenceCount < selected.stats.conferenceCount ||
        (bridge.stats.conferenceCount === selected.stats.conferenceCount && bridge.addedAt < selected.addedAt)
      ) {
        selected = bridge;
      }
    }

    return selected?.address;
  }

  getBridges(): BridgeState[] {
    return Array.from(this.bridges.values());
  }

  getBridgeCount(): number {
    return this.bridges.size;
  }

  isStarted(): boolean {
    return this.isRunning;
  }
}
