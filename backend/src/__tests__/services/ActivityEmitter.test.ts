import { describe, it, expect, jest } from '@jest/globals';
import { ActivityEvent } from '../../types/content';
import { ACTIVITY_EVENT, ActivityEmitter } from '../../services/ActivityEmitter';
import { FIXED_NOW, fixedClock } from '../helpers/fixtures';

const event: ActivityEvent = {
  verb: 'promote',
  object_type: 'content_type',
  object_id: 'type-1',
  metadata: { target_environment_key: 'production' }
};

describe('ActivityEmitter', () => {
  it('should emit and record events stamped with the clock', async () => {
    const record = jest.fn<(e: ActivityEvent) => Promise<void>>().mockResolvedValue(undefined);
    const emitter = new ActivityEmitter({ sink: { record }, now: fixedClock });
    const received: ActivityEvent[] = [];
    emitter.on(ACTIVITY_EVENT, (e: ActivityEvent) => received.push(e));

    await emitter.publish(event);

    expect(received).toEqual([{ ...event, occurred_at: FIXED_NOW }]);
    expect(record).toHaveBeenCalledWith({ ...event, occurred_at: FIXED_NOW });
  });

  it('should keep an explicit timestamp', async () => {
    const received: ActivityEvent[] = [];
    const emitter = new ActivityEmitter({ now: fixedClock });
    emitter.on(ACTIVITY_EVENT, (e: ActivityEvent) => received.push(e));
    const occurredAt = new Date('2026-01-01T00:00:00.000Z');

    await emitter.publish({ ...event, occurred_at: occurredAt });

    expect(received[0].occurred_at).toEqual(occurredAt);
  });

  it('should do nothing when disabled', async () => {
    const record = jest.fn<(e: ActivityEvent) => Promise<void>>().mockResolvedValue(undefined);
    const emitter = new ActivityEmitter({ enabled: false, sink: { record } });
    const listener = jest.fn();
    emitter.on(ACTIVITY_EVENT, listener);

    await emitter.publish(event);

    expect(emitter.isEnabled).toBe(false);
    expect(listener).not.toHaveBeenCalled();
    expect(record).not.toHaveBeenCalled();
  });

  it('should swallow listener failures and still reach the sink', async () => {
    const record = jest.fn<(e: ActivityEvent) => Promise<void>>().mockResolvedValue(undefined);
    const emitter = new ActivityEmitter({ sink: { record } });
    emitter.on(ACTIVITY_EVENT, () => {
      throw new Error('listener down');
    });

    await expect(emitter.publish(event)).resolves.toBeUndefined();
    expect(record).toHaveBeenCalledTimes(1);
  });

  it('should swallow sink failures', async () => {
    const record = jest.fn<(e: ActivityEvent) => Promise<void>>().mockRejectedValue(new Error('sink down'));
    const emitter = new ActivityEmitter({ sink: { record } });

    await expect(emitter.publish(event)).resolves.toBeUndefined();
  });
});
