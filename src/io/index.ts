/**
 * I/O module exports
 * Input sources and output sinks the interpreter can be driven by
 */

export {
  type OutputSink,
  StreamSink,
  SinkClosedError,
  MemorySink,
  createStreamSink,
  createMemorySink,
} from './sink.js';

export {
  type InputSource,
  StreamSource,
  LineSource,
  createStreamSource,
  createLineSource,
} from './source.js';
