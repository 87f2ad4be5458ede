import { NodeAddress, SingletonRole, VersionInfo } from '../types';
import { ServiceLogger } from '../common/logger';
import { ManagedBridgePool, StatsSubscription } from '../bridges/types';
import { BreweryRoomService } from '../detectors/types';
import { BridgeEventBus } from '../events/BridgeEventBus';

/**
 * Brewery rooms of the worker pools. An absent name disables that detector.
 */
export interface BreweryNames {
  recording?: string;
  sipRecording?: string;
  sipGateway?: string;
}

export interface RegistryConfig {
  /** Well-known address of the signalling server */
  serverAddress?: NodeAddress;
  breweries?: BreweryNames;
}

/**
 * Access to the protocol-level services the registry builds its
 * collaborators from
 */
export interface ProtocolProvider {
  getStatsSubscription(): StatsSubscription | undefined;
  getBreweryRooms(): BreweryRoomService | undefined;
}

export type BridgePoolFactory = (subscription: StatsSubscription, logger: ServiceLogger) => ManagedBridgePool;

export interface ServiceRegistryOptions {
  config?: RegistryConfig;
  logger?: ServiceLogger;
  /** Source of out-of-band bridge health signals */
  eventBus?: BridgeEventBus;
  bridgePoolFactory?: BridgePoolFactory;
}

export interface BindingChange {
  role: SingletonRole;
  /** New binding, undefined when the role was released */
  address?: NodeAddress;
  previous?: NodeAddress;
}

export interface ServerVersionUpdate {
  address: NodeAddress;
  version?: VersionInfo;
}

export type BridgeRemovalReason = 'lost' | 'health-check-failed' | 'reclassified';

export interface BridgeForwarded {
  address: NodeAddress;
  version?: VersionInfo;
}

export interface BridgeRemoved {
  address: NodeAddress;
  reason: BridgeRemovalReason;
}

export interface RegistryEvents {
  'initialized': () => void;
  'disposed': () => void;
  'binding-changed': (change: BindingChange) => void;
  'server-version-updated': (update: ServerVersionUpdate) => void;
  'bridge-discovered': (bridge: BridgeForwarded) => void;
  'bridge-removed': (removal: BridgeRemoved) => void;
}
