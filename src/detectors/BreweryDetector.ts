import { EventEmitter } from 'eventemitter3';
import { NodeAddress } from '../types';
import { ServiceLogger, createLogger } from '../common/logger';
import {
  BreweryListener,
  BreweryRoom,
  BreweryRoomService,
  DetectorEvents,
  WorkerInstance,
  WorkerPresence
} from './types';

/**
 * BreweryDetector - tracks the worker instances present in a brewery room
 *
 * Responsibilities:
 * - Joining the room on init and leaving it on dispose
 * - Recording each instance's idle/busy status and health
 * - Picking an idle, healthy instance for new work
 */
export abstract class BreweryDetector extends EventEmitter<DetectorEvents> implements BreweryListener {
  protected instances = new Map<NodeAddress, WorkerInstance>();
  protected logger: ServiceLogger;
  private room?: BreweryRoom;
  private sequence = 0;

  constructor(
    private rooms: BreweryRoomService,
    readonly breweryName: string,
    logger?: ServiceLogger
  ) {
    super();
    this.logger = logger ?? createLogger({ enableDetectorLogs: true });
  }

  /**
   * Short label used in log lines
   */
  protected abstract get kind(): string;

  init(): void {
    if (this.room) {
      return;
    }
    this.room = this.rooms.joinRoom(this.breweryName, this);
    this.logger.detectors(`[${this.kind}] Joined brewery ${this.breweryName}`);
  }

  dispose(): void {
    if (!this.room) {
      return;
    }
    const room = this.room;
    this.room = undefined;
    this.instances.clear();
    room.leave();
    this.removeAllListeners();
    this.logger.detectors(`[${this.kind}] Left brewery ${this.breweryName}`);
  }

  isJoined(): boolean {
    return this.room !== undefined;
  }

  onPresence(address: NodeAddress, presence: WorkerPresence): void {
    const healthy = presence.healthy ?? true;
    const existing = this.instances.get(address);

    if (!existing) {
      const instance: WorkerInstance = {
        address,
        status: presence.status,
        healthy,
        joinedAt: this.sequence++
      };
      this.instances.set(address, instance);
      this.logger.detectors(`[${this.kind}] Instance online: ${address} (${presence.status})`);
      this.emit('instance-online', instance);
      return;
    }

    if (existing.status !== presence.status || existing.healthy !== healthy) {
      existing.status = presence.status;
      existing.healthy = healthy;
      this.emit('instance-status-changed', existing);
    }
  }

  onLeft(address: NodeAddress): void {
    if (this.instances.delete(address)) {
      this.logger.detectors(`[${this.kind}] Instance offline: ${address}`);
      this.emit('instance-offline', address);
    }
  }

  getInstances(): WorkerInstance[] {
    return Array.from(this.instances.values());
  }

  getInstance(address: NodeAddress): WorkerInstance | undefined {
    return this.instances.get(address);
  }

  isAnyInstanceConnected(): boolean {
    return this.instances.size > 0;
  }

  /**
   * First idle and healthy instance in arrival order
   */
  selectInstance(exclude: Iterable<NodeAddress> = []): NodeAddress | undefined {
    const excluded = new Set(exclude);
    const candidates = this.getInstances()
      .filter(instance => instance.status === 'idle' && instance.healthy && !excluded.has(instance.address))
      .sort((a, b) => a.joinedAt - b.joinedAt);
    return candidates[0]?.address;
  }
}
