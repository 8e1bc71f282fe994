export { getTag, getNumberTag, getBooleanTag, getStringTag, tagEntries } from './tags';
