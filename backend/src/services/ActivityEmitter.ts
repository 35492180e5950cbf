/**
 * ActivityEmitter - fire-and-forget activity events
 *
 * Events are emitted in-process as `activity` and forwarded to an optional
 * sink. Listener and sink failures are logged and never reach the caller.
 */

import { EventEmitter } from 'events';
import { ActivityEvent, errorMessage } from '../types/content';
import { ActivitySink } from '../repositories/interfaces';
import { Clock, systemClock } from '../utils/ids';
import { createLogger } from '../utils/logger';

const log = createLogger('ActivityEmitter');

export const ACTIVITY_EVENT = 'activity';

export interface ActivityEmitterOptions {
  enabled?: boolean;
  sink?: ActivitySink;
  now?: Clock;
}

export class ActivityEmitter extends EventEmitter {
  private readonly enabled: boolean;
  private readonly sink: ActivitySink | undefined;
  private readonly now: Clock;

  constructor(options: ActivityEmitterOptions = {}) {
    super();
    this.enabled = options.enabled ?? true;
    this.sink = options.sink;
    this.now = options.now ?? systemClock;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  async publish(event: ActivityEvent): Promise<void> {
    if (!this.enabled) return;

    const stamped: ActivityEvent = { ...event, occurred_at: event.occurred_at ?? this.now() };

    try {
      this.emit(ACTIVITY_EVENT, stamped);
    } catch (error) {
      log.warn(`Listener failed for ${stamped.verb} ${stamped.object_type}/${stamped.object_id}: ${errorMessage(error)}`);
    }

    if (!this.sink) return;
    try {
      await this.sink.record(stamped);
    } catch (error) {
      log.warn(`Sink failed for ${stamped.verb} ${stamped.object_type}/${stamped.object_id}: ${errorMessage(error)}`);
    }
  }
}
