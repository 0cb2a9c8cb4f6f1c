export { ConsoleSink, formatResult, type ConsoleSinkOptions } from './console.js';
export { TextFileSink, JsonFileSink } from './file.js';
export { MultiSink } from './multi.js';
