export { EventBus, type EventBusOptions, type EventSink } from './event-bus.js';
