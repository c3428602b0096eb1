import winston from 'winston';

export type Logger = winston.Logger;

function isEnabled(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Create the bridge logger.
 *
 * Console output goes to stderr for every level so stdout stays free for command output.
 * Optional file logging is controlled by BRIDGE_LOG_ENABLE / BRIDGE_LOG_FILE.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (isEnabled(env.BRIDGE_LOG_ENABLE)) {
    transports.push(
      new winston.transports.File({
        filename: env.BRIDGE_LOG_FILE || 'responses-bridge.log',
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: env.BRIDGE_LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}
