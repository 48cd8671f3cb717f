import { z } from 'zod'
import { ConfigValidationError } from './errors'

export const compilerConfigSchema = z.object({
  target: z.enum(['ES2017', 'ES2018', 'ES2019', 'ES2020', 'ES2021', 'ES2022']),
  module: z.enum(['ESNext', 'ES2020', 'ES2022', 'NodeNext']),
  moduleResolution: z.enum(['Bundler', 'NodeNext']),
  strict: z.boolean(),
  outDir: z.string().min(1, 'Output directory is required'),
  lib: z.array(z.string().min(1)).min(1).readonly(),
  sourceMap: z.boolean(),
}).readonly()

/** Parsed configs are frozen all the way down, `lib` included. */
export type CompilerConfig = z.infer<typeof compilerConfigSchema>

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = compilerConfigSchema.parse({
  target: 'ES2020',
  module: 'ESNext',
  moduleResolution: 'Bundler',
  strict: true,
  outDir: 'dist',
  lib: ['ES2020', 'DOM', 'DOM.Iterable'],
  sourceMap: true,
})

/** Merge a partial config over the defaults and validate. The result is frozen. */
export function parseCompilerConfig(input: Partial<CompilerConfig> = {}): CompilerConfig {
  const result = compilerConfigSchema.safeParse({ ...DEFAULT_COMPILER_CONFIG, ...input })
  if (!result.success) throw ConfigValidationError.fromZod('compiler config', result.error)
  return result.data
}

/** tsconfig.json text. Key order is fixed so the file is stable across runs. */
export function toTsconfigJson(config: CompilerConfig, include: string[] = ['src']): string {
  const tsconfig = {
    compilerOptions: {
      target: config.target,
      module: config.module,
      moduleResolution: config.moduleResolution,
      lib: [...config.lib],
      strict: config.strict,
      outDir: config.outDir,
      sourceMap: config.sourceMap,
      esModuleInterop: true,
      skipLibCheck: true,
      isolatedModules: true,
      noEmit: config.moduleResolution === 'Bundler',
    },
    include: [...include],
  }
  return JSON.stringify(tsconfig, null, 2) + '\n'
}
