export * from './errors.js';
export {
  createLogger,
  hexPreview,
  protocolLog,
  transportLog,
  clientLog,
  type Logger,
  type LogLevel,
} from './logger.js';
