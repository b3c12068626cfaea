export { HttpStreamOpener, StreamOpenError, urlFromTemplate } from './http-opener.ts';
export type { FetchFn, StreamOpenOp } from './http-opener.ts';
