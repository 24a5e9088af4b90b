import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'crawl-prime';
const logDir = process.env.LOG_DIR || 'logs';

/**
 * Builds the nestjs-pino configuration.
 * Console gets pretty output outside production, the log file always gets JSON.
 */
export function createPinoConfig(): Params {
  mkdirSync(logDir, { recursive: true });

  return {
    pinoHttp: {
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
          'password',
          'neo4jPassword',
          'apiKey',
        ],
        remove: true,
      },

      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

      serializers: {
        req: (req: IncomingMessage) => ({
          method: req.method,
          url: req.url,
        }),
        res: (res: ServerResponse) => ({
          statusCode: res.statusCode,
        }),
      },

      autoLogging: {
        ignore: (req: IncomingMessage) => (req.url || '') === '/health',
      },

      genReqId: (req: IncomingMessage) => {
        const requestId = req.headers['x-request-id'];
        return typeof requestId === 'string' ? requestId : `req-${uuidv4()}`;
      },

      customProps: (req: IncomingMessage) => {
        const requestId = req.headers['x-request-id'];
        const traceId = req.headers['x-trace-id'];

        return {
          requestId: typeof requestId === 'string' ? requestId : undefined,
          traceId: typeof traceId === 'string' ? traceId : undefined,
        };
      },

      stream: multistream([
        {
          level: 'info',
          stream:
            process.env.NODE_ENV !== 'production'
              ? pinoPretty({
                  colorize: true,
                  translateTime: 'HH:MM:ss Z',
                  ignore: 'pid,hostname',
                  singleLine: false,
                })
              : process.stdout,
        },
        {
          level: 'debug',
          stream: createWriteStream(join(logDir, `${serviceName}.log`), {
            flags: 'a',
          }),
        },
      ]),
    },
  };
}
