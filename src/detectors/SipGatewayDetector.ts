import { NodeAddress } from '../types';
import { BreweryDetector } from './BreweryDetector';

export class SipGatewayDetector extends BreweryDetector {
  protected get kind(): string {
    return 'SipGatewayDetector';
  }

  selectSipGateway(exclude: Iterable<NodeAddress> = []): NodeAddress | undefined {
    return this.selectInstance(exclude);
  }
}
