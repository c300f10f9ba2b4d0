import type { Publisher } from '../types/publisher.ts';

/**
 * CompositePublisher - A publisher that writes to multiple publishers simultaneously
 */
export class CompositePublisher implements Publisher {
  constructor(private readonly publishers: Publisher[]) {}

  async write(chunk: string): Promise<void> {
    await Promise.all(this.publishers.map((publisher) => publisher.write(chunk)));
  }

  async close(): Promise<void> {
    // every child gets closed even if one of them fails
    const results = await Promise.allSettled(this.publishers.map((publisher) => publisher.close()));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failed) {
      throw failed.reason;
    }
  }
}
