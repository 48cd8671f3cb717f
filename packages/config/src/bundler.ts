import { z } from 'zod'
import type { UserConfig } from 'vite'
import { ConfigValidationError } from './errors'

export const devServerSchema = z.object({
  port: z.number().int().min(1).max(65535),
  /** Open the browser when the server starts. */
  open: z.boolean(),
  /** Hot module replacement. */
  hot: z.boolean(),
}).readonly()

export const bundlerConfigSchema = z.object({
  /**
   * Module the host page loads, relative to the project root. Vite takes its
   * entry from the `<script>` tag in index.html, so this value is written into
   * generated host pages and checked against the demo's; toViteConfig has no
   * field for it.
   */
  entry: z.string().regex(/^[^/].*\.ts$/, 'Entry must be a relative .ts path'),
  outFile: z.string().regex(/^[\w.-]+\.js$/, 'Output file must be a bare .js file name'),
  outDir: z.string().min(1, 'Output directory is required'),
  extensions: z.array(z.string().regex(/^\.\w+$/, 'Extensions start with a dot')).min(1).readonly(),
  devServer: devServerSchema,
}).readonly()

export type DevServerConfig = z.infer<typeof devServerSchema>
export type BundlerConfig = z.infer<typeof bundlerConfigSchema>

export type BundlerConfigInput = Partial<Omit<BundlerConfig, 'devServer'>> & {
  devServer?: Partial<DevServerConfig>
}

export const DEFAULT_BUNDLER_CONFIG: BundlerConfig = bundlerConfigSchema.parse({
  entry: 'src/main.ts',
  outFile: 'bundle.js',
  outDir: 'dist',
  extensions: ['.ts', '.js'],
  devServer: { port: 8080, open: true, hot: true },
})

/** Merge a partial config over the defaults and validate. The result is frozen. */
export function parseBundlerConfig(input: BundlerConfigInput = {}): BundlerConfig {
  const result = bundlerConfigSchema.safeParse({
    ...DEFAULT_BUNDLER_CONFIG,
    ...input,
    devServer: { ...DEFAULT_BUNDLER_CONFIG.devServer, ...input.devServer },
  })
  if (!result.success) throw ConfigValidationError.fromZod('bundler config', result.error)
  return result.data
}

/**
 * Vite config for a bundler config. Output names carry no content hash, so
 * unchanged sources produce byte-identical files. The result is plain JSON.
 */
export function toViteConfig(config: BundlerConfig): UserConfig {
  return {
    resolve: {
      extensions: [...config.extensions],
    },
    build: {
      outDir: config.outDir,
      emptyOutDir: true,
      sourcemap: false,
      rollupOptions: {
        output: {
          entryFileNames: config.outFile,
          chunkFileNames: 'chunks/[name].js',
          assetFileNames: 'assets/[name][extname]',
        },
      },
    },
    server: {
      port: config.devServer.port,
      strictPort: true,
      open: config.devServer.open,
      hmr: config.devServer.hot,
    },
  }
}

/** Source text of a `vite.config.ts` for a generated project. */
export function renderViteConfig(config: BundlerConfig): string {
  return [
    "import { defineConfig } from 'vite'",
    '',
    `export default defineConfig(${JSON.stringify(toViteConfig(config), null, 2)})`,
    '',
  ].join('\n')
}

/** Address the dev server listens on. */
export function devServerUrl(config: BundlerConfig): string {
  return `http://localhost:${config.devServer.port}/`
}
