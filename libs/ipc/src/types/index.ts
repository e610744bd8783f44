export type * from './proxy';
export type * from './metrics';
export type * from './config';
