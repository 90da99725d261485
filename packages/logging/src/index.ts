export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  type LogContext
} from './context';
export {
  createNoopLogger,
  createStructuredLogger,
  LOG_CHANNELS,
  LogEventEnvelopeSchema,
  LogEventInputSchema,
  LogLevelSchema,
  type LogChannel,
  type LogEventEnvelope,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {sanitizeForLog} from './redaction';
