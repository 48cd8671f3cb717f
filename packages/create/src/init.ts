import { mkdir, readdir, writeFile } from 'node:fs/promises'
import { basename, dirname, join, resolve } from 'node:path'
import type { ProjectDescriptor } from '@scene-starter/config/build'
import { createLogger, type Logger } from '@scene-starter/logger'
import { TargetNotEmptyError } from './errors'
import { loadTemplates, renderSkeleton, type SkeletonOptions, type Templates } from './skeleton'

export interface InitOptions extends Partial<Omit<SkeletonOptions, 'name'>> {
  targetDir: string
  /** Package name; defaults to the target directory's base name. */
  name?: string
  /** Write into a non-empty directory, replacing files with the same names. */
  force?: boolean
  templates?: Templates
  logger?: Logger
}

export interface InitResult {
  targetDir: string
  descriptor: ProjectDescriptor
  /** Written paths relative to targetDir, sorted. */
  files: string[]
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

async function assertWritable(targetDir: string, force: boolean): Promise<void> {
  let entries: string[]
  try {
    entries = await readdir(targetDir)
  } catch (err) {
    if (isMissing(err)) return
    throw err
  }
  if (entries.length > 0 && !force) throw new TargetNotEmptyError(targetDir)
}

/**
 * Create a new demo project: descriptor, compiler and bundler configs, an
 * HTML host page and the entry script. Validation runs before anything is
 * written.
 */
export async function initProject(options: InitOptions): Promise<InitResult> {
  const log = options.logger ?? createLogger({ scope: 'create' })
  const targetDir = resolve(options.targetDir)
  const templates = options.templates ?? (await loadTemplates())

  const { descriptor, files } = renderSkeleton(templates, {
    ...options,
    name: options.name ?? basename(targetDir),
  })

  await assertWritable(targetDir, options.force ?? false)
  await mkdir(targetDir, { recursive: true })

  for (const [path, content] of files) {
    const dest = join(targetDir, path)
    await mkdir(dirname(dest), { recursive: true })
    await writeFile(dest, content, 'utf8')
    log.debug('wrote file', { path })
  }

  log.info('project initialised', { name: descriptor.name, targetDir, files: files.size })
  return { targetDir, descriptor, files: [...files.keys()] }
}
