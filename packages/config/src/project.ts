import { z } from 'zod'
import { ConfigValidationError, DuplicateDependencyError } from './errors'

// ─── Schema ─────────────────────────────────────────────────────────────────

const packageNameSchema = z
  .string()
  .min(1, 'Name is required')
  .max(214)
  .regex(/^(@[a-z0-9-~][a-z0-9-._~]*\/)?[a-z0-9-~][a-z0-9-._~]*$/, 'Name must be a valid npm package name')

const versionSchema = z.string().regex(/^\d+\.\d+\.\d+$/, 'Version must be x.y.z')

export const dependencyEntrySchema = z.object({
  name: packageNameSchema,
  range: z.string().min(1, 'Range is required'),
  kind: z.enum(['runtime', 'dev']),
})

export type DependencyEntry = z.infer<typeof dependencyEntrySchema>
export type DependencyKind = DependencyEntry['kind']

export interface ProjectDescriptor {
  readonly name: string
  readonly version: string
  /** Insertion-ordered; entries are only ever appended. */
  readonly dependencies: DependencyEntry[]
}

export interface PackageJson {
  name: string
  version: string
  private: true
  type: 'module'
  scripts: Record<string, string>
  dependencies?: Record<string, string>
  devDependencies?: Record<string, string>
}

// ─── Operations ─────────────────────────────────────────────────────────────

export function createProjectDescriptor(name: string, version = '0.1.0'): ProjectDescriptor {
  const result = z.object({ name: packageNameSchema, version: versionSchema }).safeParse({ name, version })
  if (!result.success) throw ConfigValidationError.fromZod('project descriptor', result.error)
  return { ...result.data, dependencies: [] }
}

/** Append a dependency. Re-declaring a name throws {@link DuplicateDependencyError}. */
export function addDependency(
  descriptor: ProjectDescriptor,
  name: string,
  range: string,
  kind: DependencyKind = 'runtime',
): DependencyEntry {
  const result = dependencyEntrySchema.safeParse({ name, range, kind })
  if (!result.success) throw ConfigValidationError.fromZod('dependency', result.error)
  if (descriptor.dependencies.some((d) => d.name === name)) {
    throw new DuplicateDependencyError(name)
  }
  descriptor.dependencies.push(result.data)
  return result.data
}

function group(entries: DependencyEntry[], kind: DependencyKind): Record<string, string> | undefined {
  const matching = entries.filter((d) => d.kind === kind)
  if (matching.length === 0) return undefined
  return Object.fromEntries(matching.map((d) => [d.name, d.range]))
}

export function toPackageJson(descriptor: ProjectDescriptor, scripts: Record<string, string>): PackageJson {
  const pkg: PackageJson = {
    name: descriptor.name,
    version: descriptor.version,
    private: true,
    type: 'module',
    scripts: { ...scripts },
  }
  const runtime = group(descriptor.dependencies, 'runtime')
  const dev = group(descriptor.dependencies, 'dev')
  if (runtime) pkg.dependencies = runtime
  if (dev) pkg.devDependencies = dev
  return pkg
}
