import { NodeAddress, VersionInfo } from '../types';

/**
 * Owner of the multi-valued bridge role. The registry only forwards
 * discoveries and removals; selection is the pool's concern.
 */
export interface BridgePool {
  add(address: NodeAddress, version?: VersionInfo): boolean;
  remove(address: NodeAddress): boolean;
  contains(address: NodeAddress): boolean;
  lookupVersion(address: NodeAddress): VersionInfo | undefined;
}

/**
 * Pool that the registry constructs and therefore starts and releases
 */
export interface ManagedBridgePool extends BridgePool {
  init(): void;
  dispose(): void;
}

export interface BridgeStats {
  conferenceCount: number;
  participantCount?: number;
}

export type BridgeStatsHandler = (stats: BridgeStats) => void;

/**
 * Subscription to statistics published by bridges
 */
export interface StatsSubscription {
  subscribe(address: NodeAddress, handler: BridgeStatsHandler): void;
  unsubscribe(address: NodeAddress): void;
}

export interface BridgeState {
  address: NodeAddress;
  version?: VersionInfo;
  stats: BridgeStats;
  addedAt: number;
}

export interface BridgePoolEvents {
  'bridge-added': (bridge: BridgeState) => void;
  'bridge-removed': (address: NodeAddress) => void;
  'stats-updated': (bridge: BridgeState) => void;
}
