import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'clinical-ingestion';
const logDir = process.env.LOG_DIR || join(process.cwd(), 'logs');

mkdirSync(logDir, { recursive: true });

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    // Raw caller and patient identifiers never reach a log sink
    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'callerId',
        'patientId',
        '*.callerId',
        '*.patientId',
        'password',
        'token',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = req.url || '';
        return url === '/health' || url === '/metrics';
      },
    },

    genReqId: (req: IncomingMessage) => {
      const requestId = req.headers['x-request-id'];
      return typeof requestId === 'string' ? requestId : req.id;
    },

    // Write logs to both console (pretty) and file (JSON)
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
