import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import { build } from 'vite'
import {
  DEFAULT_BUNDLER_CONFIG,
  devServerUrl,
  parseBundlerConfig,
  renderViteConfig,
  toViteConfig,
} from '../bundler'
import { ConfigValidationError } from '../errors'

const fixtureRoot = fileURLToPath(new URL('./fixtures/app', import.meta.url))

describe('parseBundlerConfig', () => {
  it('returns the defaults for no input', () => {
    expect(parseBundlerConfig()).toEqual({
      entry: 'src/main.ts',
      outFile: 'bundle.js',
      outDir: 'dist',
      extensions: ['.ts', '.js'],
      devServer: { port: 8080, open: true, hot: true },
    })
  })

  it('merges a partial dev server over the defaults', () => {
    const config = parseBundlerConfig({ devServer: { open: false } })
    expect(config.devServer).toEqual({ port: 8080, open: false, hot: true })
  })

  it('reports every invalid field', () => {
    try {
      parseBundlerConfig({ outFile: 'out/app.js', devServer: { port: 0 } })
      expect.fail('expected a validation error')
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError)
      if (err instanceof ConfigValidationError) {
        expect(err.issues.map((i) => i.path)).toEqual(['outFile', 'devServer.port'])
      }
    }
  })

  it('rejects extensions without a leading dot', () => {
    expect(() => parseBundlerConfig({ extensions: ['ts'] })).toThrow(ConfigValidationError)
  })

  it('freezes nested extensions and dev server settings', () => {
    const config = parseBundlerConfig({ devServer: { port: 3000 } })
    for (const target of [DEFAULT_BUNDLER_CONFIG, config]) {
      expect(Object.isFrozen(target)).toBe(true)
      expect(Object.isFrozen(target.extensions)).toBe(true)
      expect(Object.isFrozen(target.devServer)).toBe(true)
    }
    expect(Reflect.set(DEFAULT_BUNDLER_CONFIG.devServer, 'port', 1234)).toBe(false)
    expect(() => Reflect.apply(Array.prototype.push, DEFAULT_BUNDLER_CONFIG.extensions, ['.mjs'])).toThrow(TypeError)
    expect(devServerUrl(DEFAULT_BUNDLER_CONFIG)).toBe('http://localhost:8080/')
    expect(toViteConfig(DEFAULT_BUNDLER_CONFIG).resolve?.extensions).toEqual(['.ts', '.js'])
  })
})

describe('toViteConfig', () => {
  it('maps output, resolution and dev server options', () => {
    expect(toViteConfig(DEFAULT_BUNDLER_CONFIG)).toEqual({
      resolve: { extensions: ['.ts', '.js'] },
      build: {
        outDir: 'dist',
        emptyOutDir: true,
        sourcemap: false,
        rollupOptions: {
          output: {
            entryFileNames: 'bundle.js',
            chunkFileNames: 'chunks/[name].js',
            assetFileNames: 'assets/[name][extname]',
          },
        },
      },
      server: { port: 8080, strictPort: true, open: true, hmr: true },
    })
  })

  it('serves at localhost:8080 by default', () => {
    expect(devServerUrl(DEFAULT_BUNDLER_CONFIG)).toBe('http://localhost:8080/')
  })
})

describe('renderViteConfig', () => {
  it('embeds the vite config as a defineConfig call', () => {
    const source = renderViteConfig(DEFAULT_BUNDLER_CONFIG)
    const lines = source.split('\n')

    expect(lines[0]).toBe("import { defineConfig } from 'vite'")
    expect(lines[2]).toBe('export default defineConfig({')
    expect(source.endsWith('})\n')).toBe(true)
    expect(source).toContain('"entryFileNames": "bundle.js"')
  })
})

// ─── Build determinism ──────────────────────────────────────────────────────

async function bundleFixture(): Promise<Record<string, string>> {
  const config = toViteConfig(DEFAULT_BUNDLER_CONFIG)
  const result = await build({
    ...config,
    root: fixtureRoot,
    configFile: false,
    logLevel: 'silent',
    build: { ...config.build, write: false },
  })

  const files: Record<string, string> = {}
  for (const output of Array.isArray(result) ? result : [result]) {
    if (!('output' in output)) throw new Error('Unexpected watcher from build()')
    for (const item of output.output) {
      files[item.fileName] =
        item.type === 'chunk'
          ? item.code
          : typeof item.source === 'string'
            ? item.source
            : Buffer.from(item.source).toString('base64')
    }
  }
  return files
}

describe('build output', () => {
  it('names the bundle without a content hash', async () => {
    const files = await bundleFixture()

    expect(Object.keys(files).sort()).toEqual(['bundle.js', 'index.html'])
    expect(files['index.html']).toContain('src="/bundle.js"')
  }, 60_000)

  it('is byte-identical across two builds of unchanged sources', async () => {
    const first = await bundleFixture()
    const second = await bundleFixture()

    expect(second).toEqual(first)
  }, 60_000)
})
