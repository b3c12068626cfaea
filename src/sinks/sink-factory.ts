import type { SinkConfig } from '../config/schema.ts';
import { FileSink } from './file-sink.ts';
import { StdoutSink } from './stdout-sink.ts';

/** Where the consumer puts records it drains from the record channel. */
export interface OutputSink {
  init?(): Promise<void>;
  write(record: Uint8Array): Promise<void>;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export class SinkFactory {
  static create(cfg: SinkConfig): OutputSink {
    switch (cfg.sinkType) {
      case 'stdout':
        return new StdoutSink();
      case 'file':
        return new FileSink(cfg.path);
    }
  }
}
