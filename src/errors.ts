export class ChannelClosedError extends Error {
  name = 'ChannelClosedError' as const;

  constructor() {
    super('Cannot send on a closed channel');
  }
}

export class PipelineStateError extends Error {
  name = 'PipelineStateError' as const;

  constructor(
    public readonly operation: string,
    public readonly state: string,
  ) {
    super(`Cannot ${operation} while pipeline is ${state}`);
  }
}

/**
 * Thrown by `write` once `close` has been called. Writing to a closed
 * publisher is a programming error, not something callers should recover from.
 */
export class PublisherClosedError extends Error {
  name = 'PublisherClosedError' as const;

  constructor(public readonly publisher: string) {
    super(`${publisher} is closed`);
  }
}

export class FieldMergeError extends Error {
  name = 'FieldMergeError' as const;

  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Cannot add field "${field}": ${reason}`);
  }
}

export class TelemetryClientClosedError extends Error {
  name = 'TelemetryClientClosedError' as const;

  constructor() {
    super('Telemetry client is closed');
  }
}
