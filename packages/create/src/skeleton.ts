/**
 * Project skeleton rendering.
 *
 * Pure: turns a project name plus the compiler and bundler configs into the
 * file map of a new demo project. Nothing here touches the disk.
 */

import { readFile } from 'node:fs/promises'
import {
  addDependency,
  createProjectDescriptor,
  DEFAULT_BUNDLER_CONFIG,
  DEFAULT_COMPILER_CONFIG,
  renderViteConfig,
  toPackageJson,
  toTsconfigJson,
  type BundlerConfig,
  type CompilerConfig,
  type DependencyKind,
  type ProjectDescriptor,
} from '@scene-starter/config/build'

export const STARTER_DEPENDENCIES: { name: string; range: string; kind: DependencyKind }[] = [
  { name: 'three', range: '^0.170.0', kind: 'runtime' },
  { name: '@types/three', range: '^0.170.0', kind: 'dev' },
  { name: 'typescript', range: '^5.6.3', kind: 'dev' },
  { name: 'vite', range: '^5.4.10', kind: 'dev' },
]

export const STARTER_SCRIPTS: Record<string, string> = {
  start: 'vite',
  build: 'tsc --noEmit && vite build',
  typecheck: 'tsc --noEmit',
}

export const DEFAULT_SURFACE_ID = 'renderCanvas'

export interface Templates {
  indexHtml: string
  mainTs: string
  gitignore: string
}

const TEMPLATE_DIR = new URL('../templates/', import.meta.url)

export async function loadTemplates(dir: URL = TEMPLATE_DIR): Promise<Templates> {
  const [indexHtml, mainTs, gitignore] = await Promise.all([
    readFile(new URL('index.html.tpl', dir), 'utf8'),
    readFile(new URL('main.ts.tpl', dir), 'utf8'),
    readFile(new URL('gitignore.tpl', dir), 'utf8'),
  ])
  return { indexHtml, mainTs, gitignore }
}

/** Replace `{{key}}` placeholders. An unknown key throws. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_match, key: string) => {
    const value = vars[key]
    if (value === undefined) throw new Error(`Unknown template variable: ${key}`)
    return value
  })
}

export interface SkeletonOptions {
  name: string
  title?: string
  surfaceId?: string
  bundler?: BundlerConfig
  compiler?: CompilerConfig
}

export interface Skeleton {
  descriptor: ProjectDescriptor
  /** Relative path → file content, sorted by path. */
  files: Map<string, string>
}

export function renderSkeleton(templates: Templates, options: SkeletonOptions): Skeleton {
  const bundler = options.bundler ?? DEFAULT_BUNDLER_CONFIG
  const compiler = options.compiler ?? DEFAULT_COMPILER_CONFIG

  const descriptor = createProjectDescriptor(options.name)
  for (const dep of STARTER_DEPENDENCIES) {
    addDependency(descriptor, dep.name, dep.range, dep.kind)
  }

  const vars = {
    title: options.title ?? descriptor.name,
    surfaceId: options.surfaceId ?? DEFAULT_SURFACE_ID,
    entry: bundler.entry,
  }

  const unsorted: [string, string][] = [
    ['package.json', JSON.stringify(toPackageJson(descriptor, STARTER_SCRIPTS), null, 2) + '\n'],
    ['tsconfig.json', toTsconfigJson(compiler, [bundler.entry.split('/')[0] ?? 'src'])],
    ['vite.config.ts', renderViteConfig(bundler)],
    ['index.html', renderTemplate(templates.indexHtml, vars)],
    [bundler.entry, renderTemplate(templates.mainTs, vars)],
    ['.gitignore', templates.gitignore],
  ]
  unsorted.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

  return { descriptor, files: new Map(unsorted) }
}
