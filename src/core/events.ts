import { EventEmitter } from 'events';
import type { RelayEvent, RelayEventMap } from '../types/index.js';

export type { RelayEvent, RelayEventMap } from '../types/index.js';

/**
 * Typed event channel for delivery and store activity. Listeners only
 * observe; nothing in the pipeline depends on them.
 */
export class RelayEvents extends EventEmitter {
  emit<E extends RelayEvent>(event: E, payload: RelayEventMap[E]): boolean {
    return super.emit(event, payload);
  }

  on<E extends RelayEvent>(event: E, listener: (payload: RelayEventMap[E]) => void): this {
    return super.on(event, listener);
  }
}
