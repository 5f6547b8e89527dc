export * from './event-dispatcher.impl';
export * from './handlers/logging.handler';
