import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'rag-chunking-retrieval';
const isProduction = process.env.NODE_ENV === 'production';

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
    {
      level: 'info',
      stream: isProduction
        ? process.stdout
        : pinoPretty({
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
            singleLine: false,
          }),
    },
  ];

  // JSON file output is opt-in
  const logDir = process.env.LOG_DIR;
  if (logDir) {
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        '*.apiKey',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: isProduction ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => (req.url || '') === '/status',
    },

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const requestId = headerValue(req, 'x-request-id') ?? `req-${uuidv4()}`;
      res.setHeader('X-Request-ID', requestId);
      return requestId;
    },

    customProps: (req: IncomingMessage) => ({
      requestId: headerValue(req, 'x-request-id') ?? req.id,
      traceId: headerValue(req, 'x-trace-id'),
    }),

    stream: multistream(buildStreams()),
  },
};
