import { defineConfig } from 'vite'
// Relative import: the config loader bundles it, whereas a workspace package
// name would be left to Node, which cannot load the .ts sources.
import { DEFAULT_BUNDLER_CONFIG, toViteConfig } from '../../packages/config/src/bundler'

export default defineConfig(toViteConfig(DEFAULT_BUNDLER_CONFIG))
