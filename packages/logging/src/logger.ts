import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LOG_CHANNELS = {
  server: 'server',
  download: 'download',
  access: 'access',
  error: 'error'
} as const;

export type LogChannel = (typeof LOG_CHANNELS)[keyof typeof LOG_CHANNELS];

const ChannelNameSchema = z.string().min(1).max(64).regex(/^[a-z][a-z0-9_.-]*$/u);

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    channel: ChannelNameSchema.optional(),
    message: z.string().min(1).optional(),
    request_id: z.string().min(1).max(128).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

export const LogEventEnvelopeSchema = z
  .object({
    ts: z.string().datetime(),
    level: EmittableLogLevelSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    channel: ChannelNameSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    request_id: z.string().min(1),
    message: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    remote_address: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEventEnvelope = z.infer<typeof LogEventEnvelopeSchema>;

const toLevelOrder = (level: LogLevel | EmittableLogLevel) => {
  switch (level) {
    case 'debug':
      return 10;
    case 'info':
      return 20;
    case 'warn':
      return 30;
    case 'error':
      return 40;
    case 'fatal':
      return 50;
    case 'silent':
      return 90;
  }
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  channel?: string;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelInput = Omit<LogEventInput, 'level'>;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelInput) => void;
  info: (input: LevelInput) => void;
  warn: (input: LevelInput) => void;
  error: (input: LevelInput) => void;
  fatal: (input: LevelInput) => void;
  /** Returns a logger whose records default to the given channel. */
  channel: (name: string) => StructuredLogger;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const shouldEmit = ({configuredLevel, eventLevel}: {configuredLevel: LogLevel; eventLevel: EmittableLogLevel}) =>
  toLevelOrder(eventLevel) >= toLevelOrder(configuredLevel);

const chooseStream = ({
  level,
  writer
}: {
  level: EmittableLogLevel;
  writer: StructuredLogWriter;
}) => (level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout);

const extractContext = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => ({
  request_id: input.request_id ?? context?.request_id ?? 'n/a',
  route: input.route ?? context?.route,
  method: input.method ?? context?.method,
  remote_address: context?.remote_address
});

type ResolvedLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  channel: string;
  now: () => Date;
  writer: StructuredLogWriter;
  extraSensitiveKeys: string[];
};

const toMetadataRecord = (value: unknown): Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) ? {...value} : {value};

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: ResolvedLoggerOptions;
  context: LogContext | undefined;
}): LogEventEnvelope => {
  const resolvedContext = extractContext({context, input});
  const sanitizedMetadata = toMetadataRecord(
    sanitizeForLog({
      value: input.metadata ?? {},
      extraSensitiveKeys: options.extraSensitiveKeys
    })
  );

  return LogEventEnvelopeSchema.parse({
    ts: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    channel: input.channel ?? options.channel,
    event: input.event,
    component: input.component,
    request_id: resolvedContext.request_id,
    ...(input.message ? {message: input.message} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(resolvedContext.route ? {route: resolvedContext.route} : {}),
    ...(resolvedContext.method ? {method: resolvedContext.method} : {}),
    ...(resolvedContext.remote_address ? {remote_address: resolvedContext.remote_address} : {}),
    metadata: sanitizedMetadata
  });
};

const writeLine = ({
  line,
  level,
  writer
}: {
  line: string;
  level: EmittableLogLevel;
  writer: StructuredLogWriter;
}) => {
  const stream = chooseStream({level, writer});
  stream.write(`${line}\n`);
};

const buildLogger = (options: ResolvedLoggerOptions): StructuredLogger => {
  const log = (rawInput: LogEventInput) => {
    try {
      const input = LogEventInputSchema.parse(rawInput);
      if (!shouldEmit({configuredLevel: options.level, eventLevel: input.level})) {
        return;
      }

      const envelope = createEnvelope({
        input,
        options,
        context: getLogContext()
      });
      writeLine({
        line: JSON.stringify(envelope),
        level: input.level,
        writer: options.writer
      });
    } catch {
      // Logging failures must never break runtime behavior.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'}),
    channel: name => buildLogger({...options, channel: ChannelNameSchema.parse(name)})
  };
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger =>
  buildLogger({
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    level: LogLevelSchema.parse(options.level),
    channel: ChannelNameSchema.parse(options.channel ?? LOG_CHANNELS.server),
    now: options.now ?? (() => new Date()),
    writer: options.writer ?? defaultWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  });

export const createNoopLogger = (): StructuredLogger => {
  const noop: StructuredLogger = {
    log: () => undefined,
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    fatal: () => undefined,
    channel: () => noop
  };

  return noop;
};
