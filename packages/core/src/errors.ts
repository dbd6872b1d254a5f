export class DataFormatError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'DataFormatError'
  }
}

export class DonorNotFoundError extends Error {
  constructor(public readonly donorName: string) {
    super(`Donor '${donorName}' not found`)
    this.name = 'DonorNotFoundError'
  }
}
