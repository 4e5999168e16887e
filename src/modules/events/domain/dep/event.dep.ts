export const EventDeps = {
  EventSink: Symbol.for('EventSink'),
  EventStreamService: Symbol.for('EventStreamService'),
  EventPublishers: Symbol.for('EventPublishers'),
  EventRoute: Symbol.for('EventRoute'),
};
