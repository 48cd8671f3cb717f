import { resolve } from 'node:path'
import { parseArgs } from 'node:util'
import { ConfigValidationError } from '@scene-starter/config/build'
import type { Logger } from '@scene-starter/logger'
import { TargetNotEmptyError } from './errors'
import { initProject } from './init'

export const USAGE = 'Usage: create-scene-starter <directory> [--name <package-name>] [--force]'

export interface CliIo {
  cwd: string
  out(line: string): void
  err(line: string): void
  logger?: Logger
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      name: { type: 'string' },
      force: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}

/** Returns the process exit code. Errors other than usage and validation propagate. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>
  try {
    parsed = parseCliArgs(argv)
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err))
    io.err(USAGE)
    return 1
  }

  if (parsed.values.help) {
    io.out(USAGE)
    return 0
  }

  const [dir, ...extra] = parsed.positionals
  if (dir === undefined || extra.length > 0) {
    io.err(USAGE)
    return 1
  }

  try {
    const result = await initProject({
      targetDir: resolve(io.cwd, dir),
      name: parsed.values.name,
      force: parsed.values.force ?? false,
      logger: io.logger,
    })
    io.out(`Created ${result.descriptor.name} in ${result.targetDir}`)
    io.out('')
    io.out('Next steps:')
    io.out(`  cd ${dir}`)
    io.out('  npm install')
    io.out('  npm start')
    return 0
  } catch (err) {
    if (err instanceof ConfigValidationError || err instanceof TargetNotEmptyError) {
      io.err(err.message)
      return 1
    }
    throw err
  }
}
