export { NoOpProgress } from './NoOpProgress';
export { TextProgress } from './TextProgress';
export type { TextProgressOptions, LineSink } from './TextProgress';
