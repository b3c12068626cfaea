export { SinkFactory } from './sink-factory.ts';
export type { OutputSink } from './sink-factory.ts';
export { StdoutSink } from './stdout-sink.ts';
export { FileSink } from './file-sink.ts';
export { RecordChannel, ChannelClosedError } from './record-channel.ts';
export { pump } from './pump.ts';
