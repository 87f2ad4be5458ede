import { BridgeEvent, BridgeEventBus, HEALTH_CHECK_FAILED } from '../../../src/events/BridgeEventBus';

describe('BridgeEventBus', () => {
  it('should deliver health check failures to subscribers', () => {
    const bus = new BridgeEventBus();
    const received: BridgeEvent[] = [];
    bus.on(HEALTH_CHECK_FAILED, event => received.push(event));

    bus.publishHealthCheckFailed('jvb1.internal.example.com', 'timeout');

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ bridge: 'jvb1.internal.example.com', reason: 'timeout' });
    expect(typeof received[0].timestamp).toBe('number');
  });

  it('should stop delivering once unsubscribed', () => {
    const bus = new BridgeEventBus();
    const listener = jest.fn();
    bus.on(HEALTH_CHECK_FAILED, listener);
    bus.off(HEALTH_CHECK_FAILED, listener);

    bus.publishHealthCheckFailed('jvb1.internal.example.com');

    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount(HEALTH_CHECK_FAILED)).toBe(0);
  });
});
