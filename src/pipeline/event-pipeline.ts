import { PipelineStateError } from '../errors.ts';
import type { LogEvent } from '../types/event.ts';
import type { LineParser } from '../types/parser.ts';
import { log } from '../utils/logger.ts';
import { Channel } from './channel.ts';
import { splitLines } from './lines.ts';

export type EventHandler = (event: LogEvent) => void | Promise<void>;

export interface EventPipelineOptions {
  /** Used as a prefix in log messages. */
  name: string;
  parser: LineParser;
  handler: EventHandler;
  /** Slots in each of the line and event channels. */
  channelCapacity?: number;
}

type PipelineStage = 'idle' | 'running' | 'drained';

export const DEFAULT_CHANNEL_CAPACITY = 1;

/**
 * Feeds lines to a parser and hands its events, in emission order, to a
 * handler. Two tasks run while the pipeline is up: the parse task owns the
 * parser's input, the deliver task owns the handler. They're connected by
 * channels, and closing the line channel cascades into a full drain.
 */
export class EventPipeline {
  private stage: PipelineStage = 'idle';
  private lines?: Channel<string>;
  private tasks: Promise<void>[] = [];
  private readonly name: string;
  private readonly parser: LineParser;
  private readonly handler: EventHandler;
  private readonly channelCapacity: number;

  constructor(options: EventPipelineOptions) {
    this.name = options.name;
    this.parser = options.parser;
    this.handler = options.handler;
    this.channelCapacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
  }

  get isRunning(): boolean {
    return this.stage === 'running';
  }

  start(): void {
    if (this.stage !== 'idle') {
      throw new PipelineStateError('start', this.stage);
    }
    const lines = new Channel<string>(this.channelCapacity);
    const events = new Channel<LogEvent>(this.channelCapacity);
    this.lines = lines;
    this.tasks = [this.runParseTask(lines, events), this.runDeliverTask(events)];
    this.stage = 'running';
    log.debug(`${this.name}: pipeline started`, { channelCapacity: this.channelCapacity });
  }

  /**
   * Queues every non-empty line of `chunk` in order. Resolves once the last
   * line has been accepted, which can take a while if the parser is behind.
   */
  async push(chunk: string): Promise<void> {
    const lines = this.lines;
    if (this.stage !== 'running' || !lines) {
      throw new PipelineStateError('push', this.stage);
    }
    for (const line of splitLines(chunk)) {
      await lines.send(line);
    }
  }

  /** Stops intake and waits until every accepted line has been handled. */
  async drain(): Promise<void> {
    if (this.stage === 'drained') return;
    const wasRunning = this.stage === 'running';
    this.stage = 'drained';
    if (!wasRunning) return;

    this.lines?.close();
    await Promise.all(this.tasks);
    log.debug(`${this.name}: pipeline drained`);
  }

  private async runParseTask(lines: Channel<string>, events: Channel<LogEvent>): Promise<void> {
    try {
      for await (const event of this.parser.processLines(lines)) {
        await events.send(event);
      }
    } catch (error) {
      log.error(`${this.name}: parser failed, discarding further lines`, { error });
      // keep consuming so writers never block on a dead parser
      let discarded = 0;
      for await (const _line of lines) {
        discarded++;
      }
      if (discarded > 0) {
        log.warn(`${this.name}: discarded lines after parser failure`, { discarded });
      }
    } finally {
      events.close();
    }
  }

  private async runDeliverTask(events: Channel<LogEvent>): Promise<void> {
    for await (const event of events) {
      try {
        await this.handler(event);
      } catch (error) {
        log.error(`${this.name}: failed to deliver event`, { event, error });
      }
    }
  }
}
