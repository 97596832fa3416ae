import pino, { type Logger } from 'pino';

/** Pretty output on a terminal, JSON lines otherwise. */
export function createLogger(level: string, pretty: boolean = Boolean(process.stdout.isTTY)): Logger {
  if (!pretty) {
    return pino({ name: 'vmedia-boot', level });
  }

  return pino({
    name: 'vmedia-boot',
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
      },
    },
  });
}
