function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/** A store operation that failed; carries what was asked so the log line is enough to diagnose. */
export class StorageError extends Error {
  constructor(
    readonly operation: string,
    readonly params: Record<string, unknown>,
    cause: unknown,
  ) {
    super(`${operation} failed: ${describeCause(cause)}`, { cause })
    this.name = 'StorageError'
  }
}

export class ExchangeError extends Error {
  readonly status: number | null

  constructor(
    readonly endpoint: string,
    message: string,
    opts: { status?: number; cause?: unknown } = {},
  ) {
    super(`${endpoint}: ${message}`, { cause: opts.cause })
    this.name = 'ExchangeError'
    this.status = opts.status ?? null
  }
}

/** Snapshot data the chart layer cannot shape, e.g. an unparseable timestamp. */
export class HistoryDataError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'HistoryDataError'
  }
}
