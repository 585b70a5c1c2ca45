export { parseTimings, readTiming } from './timing-loader.js';
export { reduceSamples } from './sample-reducer.js';
export type { LengthOptions } from './sample-reducer.js';
