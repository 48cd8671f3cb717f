// Build-time configuration: project descriptor, compiler and bundler configs.

export {
  createProjectDescriptor,
  addDependency,
  toPackageJson,
  dependencyEntrySchema,
  type DependencyEntry,
  type DependencyKind,
  type ProjectDescriptor,
  type PackageJson,
} from './project'

export {
  parseCompilerConfig,
  toTsconfigJson,
  compilerConfigSchema,
  DEFAULT_COMPILER_CONFIG,
  type CompilerConfig,
} from './compiler'

export {
  parseBundlerConfig,
  toViteConfig,
  renderViteConfig,
  devServerUrl,
  bundlerConfigSchema,
  devServerSchema,
  DEFAULT_BUNDLER_CONFIG,
  type BundlerConfig,
  type BundlerConfigInput,
  type DevServerConfig,
} from './bundler'

export { ConfigValidationError, DuplicateDependencyError, type ConfigIssue } from './errors'
