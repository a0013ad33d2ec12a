import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to stderr; stdout carries the scan output. */
  destination?: pino.DestinationStream;
}

export const createLogger = ({ verbose = false, destination }: LoggerOptions = {}): Logger =>
  pino(
    {
      level: verbose ? 'debug' : 'info',
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.destination(2),
  );
