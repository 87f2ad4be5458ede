import { NodeAddress } from '../../src/types';
import { BridgeStats, BridgeStatsHandler, StatsSubscription } from '../../src/bridges/types';
import {
  BreweryListener,
  BreweryRoom,
  BreweryRoomService,
  WorkerPresence
} from '../../src/detectors/types';
import { ProtocolProvider } from '../../src/registry/types';

/**
 * In-process stand-in for the bridge statistics subscription
 */
export class MockStatsSubscription implements StatsSubscription {
  private handlers = new Map<NodeAddress, BridgeStatsHandler>();
  public subscribeCalls: NodeAddress[] = [];
  public unsubscribeCalls: NodeAddress[] = [];

  subscribe(address: NodeAddress, handler: BridgeStatsHandler): void {
    this.subscribeCalls.push(address);
    this.handlers.set(address, handler);
  }

  unsubscribe(address: NodeAddress): void {
    this.unsubscribeCalls.push(address);
    this.handlers.delete(address);
  }

  isSubscribed(address: NodeAddress): boolean {
    return this.handlers.has(address);
  }

  /**
   * Deliver a stats update as if the bridge had published it
   */
  publish(address: NodeAddress, stats: BridgeStats): void {
    this.handlers.get(address)?.(stats);
  }
}

/**
 * In-process stand-in for brewery rooms; tests drive presence directly
 */
export class MockBreweryRooms implements BreweryRoomService {
  private listeners = new Map<string, BreweryListener>();
  public joined: string[] = [];
  public left: string[] = [];

  joinRoom(roomName: string, listener: BreweryListener): BreweryRoom {
    this.joined.push(roomName);
    this.listeners.set(roomName, listener);
    return {
      name: roomName,
      leave: () => {
        this.left.push(roomName);
        this.listeners.delete(roomName);
      }
    };
  }

  isJoined(roomName: string): boolean {
    return this.listeners.has(roomName);
  }

  presence(roomName: string, address: NodeAddress, presence: WorkerPresence): void {
    const listener = this.listeners.get(roomName);
    if (!listener) {
      throw new Error(`Nobody joined room ${roomName}`);
    }
    listener.onPresence(address, presence);
  }

  leave(roomName: string, address: NodeAddress): void {
    this.listeners.get(roomName)?.onLeft(address);
  }
}

export interface MockProtocolProviderOptions {
  subscription?: StatsSubscription | null;
  rooms?: BreweryRoomService | null;
}

export class MockProtocolProvider implements ProtocolProvider {
  readonly subscription?: StatsSubscription;
  readonly rooms?: BreweryRoomService;

  constructor(options: MockProtocolProviderOptions = {}) {
    // null means "not offered"; undefined means "use a fresh mock"
    this.subscription = options.subscription === null ? undefined : options.subscription ?? new MockStatsSubscription();
    this.rooms = options.rooms === null ? undefined : options.rooms ?? new MockBreweryRooms();
  }

  getStatsSubscription(): StatsSubscription | undefined {
    return this.subscription;
  }

  getBreweryRooms(): BreweryRoomService | undefined {
    return this.rooms;
  }
}

/**
 * Factory function for creating mock protocol providers
 */
export function createMockProvider(options: MockProtocolProviderOptions = {}): MockProtocolProvider {
  return new MockProtocolProvider(options);
}
