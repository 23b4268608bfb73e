/**
 * 덤프 모듈
 */

export { CacheWriteDumper } from './CacheWriteDumper';
export { OutputDumper } from './OutputDumper';
export type { OutputSink, OutputDumperOptions } from './OutputDumper';
export { PlotDumper } from './PlotDumper';
export type { PlotDumperOptions } from './PlotDumper';
