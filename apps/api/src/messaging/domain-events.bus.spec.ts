import { DomainEventsBus, type CreditScoreChangedPayload } from './domain-events.bus';

const payload: CreditScoreChangedPayload = {
  userId: 'student-1',
  event: 'on_time_delivery',
  delta: 2,
  previousScore: 70,
  newScore: 72,
  tier: 'average',
  reason: 'Order A1B2C3D4 delivered',
};

describe('DomainEventsBus', () => {
  it('delivers typed payloads to every listener', async () => {
    const bus = new DomainEventsBus();
    const first = jest.fn();
    const second = jest.fn().mockResolvedValue(undefined);
    bus.on('credit.score.changed', first);
    bus.on('credit.score.changed', second);

    bus.emit('credit.score.changed', payload);
    await bus.drain();

    expect(first).toHaveBeenCalledWith(payload);
    expect(second).toHaveBeenCalledWith(payload);
  });

  it('keeps delivering after a listener fails', async () => {
    const bus = new DomainEventsBus();
    const failing = jest.fn().mockRejectedValue(new Error('mail server down'));
    const healthy = jest.fn();
    bus.on('credit.score.changed', failing);
    bus.on('credit.score.changed', healthy);

    expect(() => bus.emit('credit.score.changed', payload)).not.toThrow();
    await bus.drain();

    expect(failing).toHaveBeenCalledTimes(1);
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it('stops delivering after off()', async () => {
    const bus = new DomainEventsBus();
    const listener = jest.fn();
    bus.on('credit.score.changed', listener);
    bus.off('credit.score.changed', listener);

    bus.emit('credit.score.changed', payload);
    await bus.drain();

    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount('credit.score.changed')).toBe(0);
  });
});
