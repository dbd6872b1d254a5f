/** Bad command-line or demo input. The CLI exits with status 2 on these. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
