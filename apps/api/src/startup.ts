import { pino, type DestinationStream } from 'pino';

/** Failures before the Fastify logger exists, e.g. a ConfigError from loadConfig. */
export function logStartupFailure(err: unknown, destination?: DestinationStream): void {
  const options = { name: 'budget-lens-api' };
  const log = destination ? pino(options, destination) : pino(options);
  log.fatal({ err }, 'startup failed');
}
