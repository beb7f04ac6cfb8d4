import winston, { format } from 'winston'

const alignedWithColorsAndTime = format.combine(
  format.colorize(),
  format.timestamp({ format: 'shortTime' }),
  format.align(),
  format.printf(info => info.label
    ? `[${info.timestamp}] ${info.level}: (${info.label}) ${info.message}`
    : `[${info.timestamp}] ${info.level}: ${info.message}`),
)

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  format: alignedWithColorsAndTime,
  transports: [
    new winston.transports.Console({ stderrLevels: ['error', 'warn'] }),
  ],
})

/** Returns a child logger whose lines are tagged with `label` */
export function createLogger(label: string) {
  return logger.child({ label })
}
