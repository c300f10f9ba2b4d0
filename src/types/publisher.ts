export interface Publisher {
  // accepts an arbitrary blob of newline-separated text
  write(chunk: string): Promise<void>;
  close(): Promise<void>;
}

export type PublisherState = 'uninitialized' | 'initialized' | 'closed';

/** Anything a console publisher can print to; `process.stdout` fits. */
export interface OutputStream {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
}
