export type { Logger } from './logger';
export { normalizeTags, tagFromHashtag } from './tags';
