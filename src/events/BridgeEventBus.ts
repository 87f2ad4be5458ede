import { EventEmitter } from 'eventemitter3';
import { NodeAddress } from '../types';

export const HEALTH_CHECK_FAILED = 'health-check-failed';

export interface BridgeEvent {
  bridge: NodeAddress;
  reason?: string;
  timestamp: number;
}

export interface BridgeEventTypes {
  [HEALTH_CHECK_FAILED]: (event: BridgeEvent) => void;
}

/**
 * Out-of-band signals about bridges, such as failed health checks
 */
export class BridgeEventBus extends EventEmitter<BridgeEventTypes> {
  publishHealthCheckFailed(bridge: NodeAddress, reason?: string): void {
    this.emit(HEALTH_CHECK_FAILED, { bridge, reason, timestamp: Date.now() });
  }
}
