import pino, { Bindings, LoggerOptions } from 'pino';

// Credentials that can reach a log line through client config or request headers
const REDACTED_PATHS = ['apiKey', '*.apiKey', 'req.headers.authorization'];

export function loggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
     const options: LoggerOptions = {
          level: env.LOG_LEVEL || 'info',
          formatters: {
               level: (label: string) => ({ level: label }),
          },
          serializers: {
               err: pino.stdSerializers.err,
               req: pino.stdSerializers.req,
               res: pino.stdSerializers.res,
          },
          redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
          base: {
               service: env.SERVICE_NAME || 'allocation',
               environment: env.NODE_ENV || 'production',
          },
     };

     if (env.NODE_ENV === 'development') {
          options.transport = {
               target: 'pino-pretty',
               options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
               },
          };
     }

     return options;
}

export const logger = pino(loggerOptions());

export function createChildLogger(context: Bindings) {
     return logger.child(context);
}
