export { getStreamChunkReader } from './fs-helpers/chunk-reader.js';
export type { ChunkReader, ChunkReaderKind } from './fs-helpers/chunk-reader.js';
export { InputSource } from './fs-helpers/input-source.js';
export { openSource } from './fs-helpers/open-source.js';
export type { OpenSourceResult } from './fs-helpers/open-source.js';
export { copyHeadBytes } from './fs-helpers/readers/head-bytes.js';
export { copyHeadLines } from './fs-helpers/readers/head-lines.js';
export type { HeadSink } from './fs-helpers/readers/head-sink.js';
export { decodeUtf8Lossy } from './fs-helpers/readers/utf8.js';
