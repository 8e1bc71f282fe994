export { parseSnapshot } from './snapshot';
export { isJsonObject, hasOwn, collectTags } from './helpers';
export type { Snapshot, PayloadShape, RawPayload, PayloadUnwrap, ParseResult } from './types';
