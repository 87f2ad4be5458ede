import { EventEmitter } from 'eventemitter3';
import {
  CapabilitySet,
  NodeAddress,
  ServiceBindings,
  ServiceRole,
  SingletonRole,
  VersionInfo,
  formatVersion
} from '../types';
import { ServiceLogger, createLogger } from '../common/logger';
import { ConfigurationError, RegistryStateError } from '../common/errors';
import { classify } from '../discovery/CapabilityMatcher';
import { BridgeSelector } from '../bridges/BridgeSelector';
import { BridgePool, ManagedBridgePool } from '../bridges/types';
import { BreweryDetector } from '../detectors/BreweryDetector';
import { RecorderDetector } from '../detectors/RecorderDetector';
import { SipGatewayDetector } from '../detectors/SipGatewayDetector';
import { BreweryRoomService } from '../detectors/types';
import { BridgeEvent, BridgeEventBus, HEALTH_CHECK_FAILED } from '../events/BridgeEventBus';
import {
  BindingChange,
  BreweryNames,
  BridgePoolFactory,
  ProtocolProvider,
  RegistryConfig,
  RegistryEvents,
  ServiceRegistryOptions
} from './types';

type RegistryState = 'created' | 'running' | 'disposed';

const EMPTY_BINDINGS: ServiceBindings = Object.freeze({});

const ROLE_LABELS: Record<SingletonRole, string> = {
  [ServiceRole.SipGateway]: 'SIP gateway',
  [ServiceRole.RoomService]: 'Room service'
};

const defaultBridgePoolFactory: BridgePoolFactory = (subscription, logger) =>
  new BridgeSelector(subscription, logger);

interface OwnedCollaborators {
  bridgePool: ManagedBridgePool;
  recorderDetector?: RecorderDetector;
  sipRecorderDetector?: RecorderDetector;
  sipGatewayDetector?: SipGatewayDetector;
}

/**
 * ServiceRegistry tracks which cluster node serves which role
 *
 * Responsibilities:
 * - Classifying discovered nodes by their advertised features
 * - Holding the single-valued bindings (SIP gateway, room service)
 * - Recording the signalling server's version
 * - Forwarding bridges to the bridge pool, which owns bridge membership
 * - Owning the bridge pool and the brewery detectors it builds on init
 *
 * Bindings are kept in one immutable snapshot that is replaced as a whole,
 * and every change is committed before any collaborator is called.
 */
export class ServiceRegistry extends EventEmitter<RegistryEvents> {
  private bindings: ServiceBindings = EMPTY_BINDINGS;
  private state: RegistryState = 'created';
  private owned?: OwnedCollaborators;
  private readonly config: RegistryConfig;
  private readonly logger: ServiceLogger;
  private readonly eventBus?: BridgeEventBus;
  private readonly bridgePoolFactory: BridgePoolFactory;

  private readonly healthCheckListener = (event: BridgeEvent): void => {
    this.onHealthCheckFailed(event.bridge);
  };

  constructor(
    private readonly provider: ProtocolProvider,
    options: ServiceRegistryOptions = {}
  ) {
    super();
    this.config = {
      serverAddress: options.config?.serverAddress,
      breweries: normalizeBreweries(options.config?.breweries)
    };
    this.logger = options.logger ?? createLogger({ enableRegistryLogs: true });
    this.eventBus = options.eventBus;
    this.bridgePoolFactory = options.bridgePoolFactory ?? defaultBridgePoolFactory;
  }

  /**
   * Build and start the bridge pool and every configured detector.
   * Must be called exactly once before any event is dispatched.
   */
  init(): void {
    if (this.state === 'running') {
      throw new RegistryStateError('ALREADY_INITIALIZED', 'ServiceRegistry is already initialized');
    }
    if (this.state === 'disposed') {
      throw new RegistryStateError('DISPOSED', 'ServiceRegistry has been disposed and cannot be initialized again');
    }

    const subscription = this.provider.getStatsSubscription();
    if (!subscription) {
      throw new ConfigurationError(
        'MISSING_STATS_SUBSCRIPTION',
        'A stats subscription is required to build the bridge pool'
      );
    }
    const breweries = this.config.breweries ?? {};
    const rooms = this.resolveBreweryRooms(breweries);

    const started: Array<{ dispose(): void }> = [];
    try {
      const bridgePool = this.bridgePoolFactory(subscription, this.logger);
      bridgePool.init();
      started.push(bridgePool);

      const owned: OwnedCollaborators = { bridgePool };
      if (rooms) {
        if (breweries.recording) {
          owned.recorderDetector = startDetector(
            new RecorderDetector(rooms, breweries.recording, false, this.logger),
            started
          );
        }
        if (breweries.sipGateway) {
          owned.sipGatewayDetector = startDetector(
            new SipGatewayDetector(rooms, breweries.sipGateway, this.logger),
            started
          );
        }
        if (breweries.sipRecording) {
          owned.sipRecorderDetector = startDetector(
            new RecorderDetector(rooms, breweries.sipRecording, true, this.logger),
            started
          );
        }
      }
      this.owned = owned;
    } catch (error) {
      try {
        disposeAll(started.reverse());
      } catch (rollbackError) {
        this.logger.error('[ServiceRegistry] Failed to release collaborators after a failed init', rollbackError);
      }
      throw error;
    }

    this.eventBus?.on(HEALTH_CHECK_FAILED, this.healthCheckListener);
    this.state = 'running';
    this.logger.registry(
      `[ServiceRegistry] Started${this.config.serverAddress ? ` for server ${this.config.serverAddress}` : ''}`
    );
    this.emit('initialized');
  }

  /**
   * Release every owned collaborator and clear all bindings.
   * The registry accepts no events afterwards.
   */
  dispose(): void {
    if (this.state === 'disposed') {
      return;
    }

    const owned = this.owned;
    this.owned = undefined;
    this.bindings = EMPTY_BINDINGS;
    this.state = 'disposed';
    this.eventBus?.off(HEALTH_CHECK_FAILED, this.healthCheckListener);

    try {
      if (owned) {
        disposeAll([
          owned.sipRecorderDetector,
          owned.sipGatewayDetector,
          owned.recorderDetector,
          owned.bridgePool
        ]);
      }
    } finally {
      this.logger.registry('[ServiceRegistry] Stopped');
      this.emit('disposed');
    }
  }

  /**
   * Classify a discovered node and apply the rule for its role
   */
  onNodeDiscovered(address: NodeAddress, capabilities: CapabilitySet, version?: VersionInfo): void {
    const { bridgePool } = this.requireRunning('onNodeDiscovered');
    const role = classify(capabilities);

    if (role) {
      this.releaseOtherRoles(address, role);
    }

    switch (role) {
      case ServiceRole.BridgeNode:
        bridgePool.add(address, version);
        this.emit('bridge-discovered', { address, version });
        return;
      case ServiceRole.SipGateway:
      case ServiceRole.RoomService:
        this.bind(role, address);
        if (bridgePool.contains(address)) {
          this.logger.registry(`Bridge ${address} now advertises ${role}, removing it from the pool`);
          bridgePool.remove(address);
          this.emit('bridge-removed', { address, reason: 'reclassified' });
        }
        return;
    }

    if (this.config.serverAddress !== undefined && this.config.serverAddress === address) {
      this.bindings = Object.freeze({ ...this.bindings, serverVersion: version });
      this.logger.registry(`Detected server version: ${version ? formatVersion(version) : 'unknown'}`);
      this.emit('server-version-updated', { address, version });
    }
  }

  /**
   * Release every role held by a node that is no longer reachable.
   * Unknown addresses are ignored.
   */
  onNodeLost(address: NodeAddress): void {
    const { bridgePool } = this.requireRunning('onNodeLost');

    for (const role of [ServiceRole.SipGateway, ServiceRole.RoomService] as const) {
      if (this.boundAddress(role) === address) {
        this.logger.warn(`${ROLE_LABELS[role]} went offline: ${address}`);
        this.release(role);
      }
    }

    if (bridgePool.contains(address)) {
      bridgePool.remove(address);
      this.emit('bridge-removed', { address, reason: 'lost' });
    }
  }

  /**
   * Evict a bridge that failed its health check. Always forwarded to the
   * pool; singleton bindings are untouched.
   */
  onHealthCheckFailed(address: NodeAddress): void {
    const { bridgePool } = this.requireRunning('onHealthCheckFailed');

    this.logger.warn(`Health check failed for bridge ${address}`);
    if (bridgePool.remove(address)) {
      this.emit('bridge-removed', { address, reason: 'health-check-failed' });
    }
  }

  getSipGateway(): NodeAddress | undefined {
    return this.bindings.sipGateway;
  }

  getRoomService(): NodeAddress | undefined {
    return this.bindings.roomService;
  }

  getServerVersion(): VersionInfo | undefined {
    return this.bindings.serverVersion;
  }

  getBindings(): ServiceBindings {
    return this.bindings;
  }

  getServerAddress(): NodeAddress | undefined {
    return this.config.serverAddress;
  }

  getBridgeVersion(address: NodeAddress): VersionInfo | undefined {
    return this.owned?.bridgePool.lookupVersion(address);
  }

  getBridgePool(): BridgePool | undefined {
    return this.owned?.bridgePool;
  }

  getRecorderDetector(): RecorderDetector | undefined {
    return this.owned?.recorderDetector;
  }

  getSipRecorderDetector(): RecorderDetector | undefined {
    return this.owned?.sipRecorderDetector;
  }

  getSipGatewayDetector(): SipGatewayDetector | undefined {
    return this.owned?.sipGatewayDetector;
  }

  isInitialized(): boolean {
    return this.state === 'running';
  }

  isDisposed(): boolean {
    return this.state === 'disposed';
  }

  /**
   * Bind a singleton role. The first address wins until it is lost; a
   * different address discovered meanwhile is ignored rather than reported
   * as a conflict, which tolerates duplicate discovery broadcasts but would
   * also hide two nodes genuinely claiming the role.
   */
  private bind(role: SingletonRole, address: NodeAddress): void {
    const current = this.boundAddress(role);
    if (current === address) {
      return;
    }
    if (current !== undefined) {
      this.logger.debug(`Ignoring ${ROLE_LABELS[role]} ${address}, already bound to ${current}`);
      return;
    }

    this.commit(role, address);
    this.logger.registry(
      role === ServiceRole.SipGateway
        ? `Discovered SIP gateway: ${address}`
        : `Room service discovered: ${address}`
    );
    const change: BindingChange = { role, address };
    this.emit('binding-changed', change);
  }

  private release(role: SingletonRole): void {
    const previous = this.boundAddress(role);
    if (previous === undefined) {
      return;
    }
    this.commit(role, undefined);
    const change: BindingChange = { role, address: undefined, previous };
    this.emit('binding-changed', change);
  }

  /**
   * A node re-discovered under a different role gives up the singleton
   * role it held before
   */
  private releaseOtherRoles(address: NodeAddress, role: ServiceRole): void {
    for (const held of [ServiceRole.SipGateway, ServiceRole.RoomService] as const) {
      if (held !== role && this.boundAddress(held) === address) {
        this.logger.registry(`${ROLE_LABELS[held]} ${address} now advertises ${role}, releasing`);
        this.release(held);
      }
    }
  }

  private boundAddress(role: SingletonRole): NodeAddress | undefined {
    return role === ServiceRole.SipGateway ? this.bindings.sipGateway : this.bindings.roomService;
  }

  private commit(role: SingletonRole, address: NodeAddress | undefined): void {
    this.bindings = Object.freeze(
      role === ServiceRole.SipGateway
        ? { ...this.bindings, sipGateway: address }
        : { ...this.bindings, roomService: address }
    );
  }

  private requireRunning(operation: string): OwnedCollaborators {
    if (this.state === 'disposed') {
      throw new RegistryStateError('DISPOSED', `Cannot call ${operation} after the registry was disposed`, { operation });
    }
    if (this.state !== 'running' || !this.owned) {
      throw new RegistryStateError('NOT_INITIALIZED', `Cannot call ${operation} before init()`, { operation });
    }
    return this.owned;
  }

  private resolveBreweryRooms(breweries: BreweryNames): BreweryRoomService | undefined {
    if (!breweries.recording && !breweries.sipRecording && !breweries.sipGateway) {
      return undefined;
    }
    const rooms = this.provider.getBreweryRooms();
    if (!rooms) {
      throw new ConfigurationError(
        'MISSING_BREWERY_ROOMS',
        'Brewery rooms are configured but the provider offers no room service',
        { breweries }
      );
    }
    return rooms;
  }
}

function startDetector<T extends BreweryDetector>(detector: T, started: Array<{ dispose(): void }>): T {
  detector.init();
  started.push(detector);
  return detector;
}

/**
 * Dispose every collaborator even when one of them throws; the first
 * error is rethrown once all have been released.
 */
function disposeAll(collaborators: Array<{ dispose(): void } | undefined>): void {
  const failures: unknown[] = [];
  for (const collaborator of collaborators) {
    try {
      collaborator?.dispose();
    } catch (error) {
      failures.push(error);
    }
  }
  if (failures.length > 0) {
    throw failures[0];
  }
}

function normalizeBreweries(breweries: BreweryNames = {}): BreweryNames {
  const trimmed = (name?: string): string | undefined => {
    const value = name?.trim();
    return value ? value : undefined;
  };
  return {
    recording: trimmed(breweries.recording),
    sipRecording: trimmed(breweries.sipRecording),
    sipGateway: trimmed(breweries.sipGateway)
  };
}
