import { BridgeSelector } from '../../../src/bridges/BridgeSelector';
import { BridgeState } from '../../../src/bridges/types';
import { MockStatsSubscription } from '../../helpers/mockProtocolProvider';
import { spyLogger } from '../../helpers/spyLogger';
import { addresses, bridgeVersion } from '../../fixtures/nodes';

describe('BridgeSelector', () => {
  let subscription: MockStatsSubscription;
  let selector: BridgeSelector;

  beforeEach(() => {
    subscription = new MockStatsSubscription();
    selector = new BridgeSelector(subscription, spyLogger());
    selector.init();
  });

  afterEach(() => {
    selector.dispose();
  });

  describe('Membership', () => {
    it('should add a bridge and subscribe to its stats', () => {
      expect(selector.add(addresses.bridge1, bridgeVersion)).toBe(true);

      expect(selector.contains(addresses.bridge1)).toBe(true);
      expect(selector.lookupVersion(addresses.bridge1)).toEqual(bridgeVersion);
      expect(subscription.isSubscribed(addresses.bridge1)).toBe(true);
      expect(selector.getBridgeCount()).toBe(1);
    });

    it('should treat a repeated add as a version refresh', () => {
      const added = jest.fn();
      selector.on('bridge-added', added);
      const newer = { ...bridgeVersion, version: '2.4.0' };

      selector.add(addresses.bridge1);
      expect(selector.add(addresses.bridge1, newer)).toBe(false);

      expect(selector.lookupVersion(addresses.bridge1)).toEqual(newer);
      expect(subscription.subscribeCalls).toEqual([addresses.bridge1]);
      expect(added).toHaveBeenCalledTimes(1);
    });

    it('should keep the known version when a repeated add carries none', () => {
      selector.add(addresses.bridge1, bridgeVersion);
      selector.add(addresses.bridge1);

      expect(selector.lookupVersion(addresses.bridge1)).toEqual(bridgeVersion);
    });

    it('should remove a bridge and unsubscribe', () => {
      const removed = jest.fn();
      selector.on('bridge-removed', removed);
      selector.add(addresses.bridge1);

      expect(selector.remove(addresses.bridge1)).toBe(true);
      expect(selector.remove(addresses.bridge1)).toBe(false);

      expect(selector.contains(addresses.bridge1)).toBe(false);
      expect(selector.lookupVersion(addresses.bridge1)).toBeUndefined();
      expect(subscription.unsubscribeCalls).toEqual([addresses.bridge1]);
      expect(removed).toHaveBeenCalledTimes(1);
      expect(removed).toHaveBeenCalledWith(addresses.bridge1);
    });

    it('should unsubscribe from every bridge on dispose', () => {
      selector.add(addresses.bridge1);
      selector.add(addresses.bridge2);

      selector.dispose();

      expect(subscription.unsubscribeCalls).toEqual([addresses.bridge1, addresses.bridge2]);
      expect(selector.getBridgeCount()).toBe(0);
      expect(selector.isStarted()).toBe(false);
    });
  });

  describe('Statistics', () => {
    it('should record stats published through the subscription', () => {
      const updates: BridgeState[] = [];
      selector.on('stats-updated', bridge => updates.push(bridge));
      selector.add(addresses.bridge1);

      subscription.publish(addresses.bridge1, { conferenceCount: 4, participantCount: 12 });

      expect(selector.getBridges()[0].stats).toEqual({ conferenceCount: 4, participantCount: 12 });
      expect(updates).toHaveLength(1);
    });

    it('should drop stats for unknown bridges', () => {
      selector.updateStats(addresses.bridge2, { conferenceCount: 1 });

      expect(selector.getBridges()).toEqual([]);
    });
  });

  describe('Selection', () => {
    it('should return nothing from an empty pool', () => {
      expect(selector.selectBridge()).toBeUndefined();
    });

    it('should pick the bridge with the fewest conferences', () => {
      selector.add(addresses.bridge1);
      selector.add(addresses.bridge2);
      selector.updateStats(addresses.bridge1, { conferenceCount: 5 });
      selector.updateStats(addresses.bridge2, { conferenceCount: 2 });

      expect(selector.selectBridge()).toBe(addresses.bridge2);
    });

    it('should break ties by the order bridges were added', () => {
      selector.add(addresses.bridge2);
      selector.add(addresses.bridge1);

      expect(selector.selectBridge()).toBe(addresses.bridge2);
    });

    it('should skip excluded bridges', () => {
      selector.add(addresses.bridge1);
      selector.add(addresses.bridge2);

      expect(selector.selectBridge([addresses.bridge1])).toBe(addresses.bridge2);
      expect(selector.selectBridge([addresses.bridge1, addresses.bridge2])).toBeUndefined();
    });
  });
});
