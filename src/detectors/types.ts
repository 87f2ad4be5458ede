import { NodeAddress } from '../types';

export type WorkerStatus = 'idle' | 'busy';

/**
 * Presence a worker instance publishes in its brewery room
 */
export interface WorkerPresence {
  status: WorkerStatus;
  healthy?: boolean;
}

export interface WorkerInstance {
  address: NodeAddress;
  status: WorkerStatus;
  healthy: boolean;
  joinedAt: number;
}

export interface BreweryListener {
  onPresence(address: NodeAddress, presence: WorkerPresence): void;
  onLeft(address: NodeAddress): void;
}

export interface BreweryRoom {
  readonly name: string;
  leave(): void;
}

/**
 * Joins the rooms worker pools use to announce themselves
 */
export interface BreweryRoomService {
  joinRoom(roomName: string, listener: BreweryListener): BreweryRoom;
}

export interface DetectorEvents {
  'instance-online': (instance: WorkerInstance) => void;
  'instance-offline': (address: NodeAddress) => void;
  'instance-status-changed': (instance: WorkerInstance) => void;
}
