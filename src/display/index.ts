export { Display } from './display.js';
export type { DisplayMode, DisplayOptions } from './display.js';
export { StreamHtmlSink, BufferHtmlSink } from './sink.js';
export type { HtmlSink } from './sink.js';
