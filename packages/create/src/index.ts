export { initProject, type InitOptions, type InitResult } from './init'
export { runCli, USAGE, type CliIo } from './cli'
export {
  renderSkeleton,
  renderTemplate,
  loadTemplates,
  STARTER_DEPENDENCIES,
  STARTER_SCRIPTS,
  DEFAULT_SURFACE_ID,
  type Skeleton,
  type SkeletonOptions,
  type Templates,
} from './skeleton'
export { TargetNotEmptyError } from './errors'
