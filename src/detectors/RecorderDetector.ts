import { NodeAddress } from '../types';
import { ServiceLogger } from '../common/logger';
import { BreweryDetector } from './BreweryDetector';
import { BreweryRoomService } from './types';

/**
 * Detects recorder instances. A SIP detector watches the separate pool of
 * recorders that dial out over SIP.
 */
export class RecorderDetector extends BreweryDetector {
  constructor(
    rooms: BreweryRoomService,
    breweryName: string,
    readonly isSip: boolean,
    logger?: ServiceLogger
  ) {
    super(rooms, breweryName, logger);
  }

  protected get kind(): string {
    return this.isSip ? 'SipRecorderDetector' : 'RecorderDetector';
  }

  selectRecorder(exclude: Iterable<NodeAddress> = []): NodeAddress | undefined {
    return this.selectInstance(exclude);
  }
}
