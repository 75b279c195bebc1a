import { Params } from 'nestjs-pino';
import type { Options } from 'pino-http';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream, type StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'docqa-assistant';
const logDir = process.env.LOG_DIR;
const isProduction = process.env.NODE_ENV === 'production';

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
    // Console output, pretty outside production
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

  // File output with JSON formatting
  if (logDir) {
    mkdirSync(logDir, { recursive: true });
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
}

export const pinoHttpOptions: Options = {
  level: process.env.LOG_LEVEL || 'info',

  base: {
    service: serviceName,
    environment: process.env.NODE_ENV || 'development',
    version: process.env.APP_VERSION || '1.0.0',
  },

  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'req.headers["x-api-key"]',
      'apiKey',
      'openaiApiKey',
      'googleApiKey',
      'anthropicApiKey',
      'qdrantApiKey',
    ],
    remove: true,
  },

  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  serializers: {
    req: (req: IncomingMessage) => ({
      id: headerValue(req, 'x-request-id'),
      method: req.method,
      url: req.url,
      headers: isProduction ? undefined : req.headers,
    }),
    res: (res: ServerResponse) => ({
      statusCode: res.statusCode,
    }),
  },

  customProps: (req: IncomingMessage) => ({
    requestId: headerValue(req, 'x-request-id'),
    sessionId: headerValue(req, 'x-session-id'),
  }),

  stream: multistream(buildStreams()),
};

export const pinoConfig: Params = { pinoHttp: pinoHttpOptions };
