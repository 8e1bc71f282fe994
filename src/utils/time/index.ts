export { now, createNodeTimer } from './time';
export { formatDuration, pad2 } from './helpers';
