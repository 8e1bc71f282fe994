export { createFileSink, openAppendStream, formatLinePrefix } from './file-sink';
