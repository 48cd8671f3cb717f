import { createLogger, parseLogLevel, stdioSink } from '@scene-starter/logger'
import { runCli } from './cli'

const logger = createLogger({
  scope: 'create',
  level: parseLogLevel(process.env['LOG_LEVEL'], 'warn'),
  sink: stdioSink,
})

runCli(process.argv.slice(2), {
  cwd: process.cwd(),
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
  logger,
}).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    logger.fatal('create failed', { err })
    process.exitCode = 1
  },
)
