/** Error when the target directory already has content and overwriting was not requested. */
export class TargetNotEmptyError extends Error {
  constructor(public readonly targetDir: string) {
    super(`Target directory is not empty: ${targetDir} (pass --force to write into it)`)
    this.name = 'TargetNotEmptyError'
  }
}
