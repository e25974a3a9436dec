export type LoadErrorKind = 'missing-file' | 'malformed-timestamp' | 'missing-column' | 'http'

export class LoadError extends Error {
  readonly kind: LoadErrorKind
  readonly path: string

  constructor(kind: LoadErrorKind, path: string, message: string) {
    super(message)
    this.name = 'LoadError'
    this.kind = kind
    this.path = path
  }
}

export class MissingFileError extends LoadError {
  constructor(path: string) {
    super('missing-file', path, `The file '${path}' was not found.`)
    this.name = 'MissingFileError'
  }
}

export class MalformedTimestampError extends LoadError {
  readonly rowNumber: number
  readonly column: string
  readonly value: string

  constructor(path: string, rowNumber: number, column: string, value: string) {
    super('malformed-timestamp', path, `Row ${rowNumber} of '${path}': cannot parse ${column} value '${value}'.`)
    this.name = 'MalformedTimestampError'
    this.rowNumber = rowNumber
    this.column = column
    this.value = value
  }
}

export class MissingColumnError extends LoadError {
  readonly column: string

  constructor(path: string, column: string) {
    super('missing-column', path, `The file '${path}' has no '${column}' column.`)
    this.name = 'MissingColumnError'
    this.column = column
  }
}
