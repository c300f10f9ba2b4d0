import { PublisherClosedError } from '../errors.ts';
import { EventPipeline } from '../pipeline/event-pipeline.ts';
import type { LogEvent } from '../types/event.ts';
import type { LineParser } from '../types/parser.ts';
import type { Publisher, PublisherState } from '../types/publisher.ts';
import { log } from '../utils/logger.ts';

export interface StreamingPublisherOptions {
  parser: LineParser;
  channelCapacity?: number;
}

/**
 * Lifecycle shared by the publishers that parse lines into events.
 *
 * uninitialized → initialized happens on the first `write`, exactly once;
 * initialized → closed happens on `close`, after every accepted line has been
 * parsed and delivered and the subclass has flushed its sink.
 */
export abstract class StreamingPublisher implements Publisher {
  private currentState: PublisherState = 'uninitialized';
  private closing?: Promise<void>;
  private readonly pipeline: EventPipeline;

  protected constructor(
    protected readonly name: string,
    options: StreamingPublisherOptions,
  ) {
    this.pipeline = new EventPipeline({
      name,
      parser: options.parser,
      channelCapacity: options.channelCapacity,
      handler: (event) => this.deliver(event),
    });
  }

  get state(): PublisherState {
    return this.currentState;
  }

  async write(chunk: string): Promise<void> {
    if (this.currentState === 'closed') {
      throw new PublisherClosedError(this.name);
    }
    if (this.currentState === 'uninitialized') {
      // initialize() is synchronous, so the guard can't be raced by a second write
      log.info(`initializing ${this.name}`);
      this.initialize();
      this.pipeline.start();
      this.currentState = 'initialized';
    }
    await this.pipeline.push(chunk);
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  /** Sets up the sink. Throwing here fails the first `write`. */
  protected initialize(): void {}

  /** Handles one parsed event inside the deliver task. */
  protected abstract deliver(event: LogEvent): void | Promise<void>;

  /** Waits for the sink to acknowledge everything it has been handed. */
  protected async flush(): Promise<void> {}

  private async shutdown(): Promise<void> {
    const wasInitialized = this.currentState === 'initialized';
    this.currentState = 'closed';
    if (!wasInitialized) return;

    await this.pipeline.drain();
    await this.flush();
    log.info(`${this.name} closed`);
  }
}
