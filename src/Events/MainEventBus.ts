/**
 * Central event bus for lifecycle events of the sync engine (config, store, decisions).
 */
import { EventEmitter } from 'events';
import type { EventName, EventPayloads } from '../Domain/index.js';
import { metricsService, type MetricsService } from '../Services/MetricsService.js';

/**
 * MainEventBus is the internal event system; the console app subscribes to it for output.
 */
export class MainEventBus extends EventEmitter {
    private _metrics: MetricsService;

    /**
     * @param metrics MetricsService - counter sink for published events
     * @example
     * const bus = new MainEventBus();
     */
    constructor(metrics: MetricsService = metricsService) {
        super();
        this._metrics = metrics;
    }

    /** Typed emit helper enforcing known event names and payloads. */
    public Emit<T extends EventName>(eventName: T, payload: EventPayloads[T]): boolean {
        this._metrics.IncEvent(eventName);
        return super.emit(eventName, payload);
    }

    /** Typed on helper enforcing known event names and payloads. */
    public On<T extends EventName>(eventName: T, listener: (payload: EventPayloads[T]) => void): this {
        super.on(eventName, listener);
        return this;
    }
}

/**
 * Global event bus instance for the application.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On('decision.saved', payload => ...);
 */
export const MAIN_EVENT_BUS = new MainEventBus();
