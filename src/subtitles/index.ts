export * from './types';
export * from './errors';
export * from './timecode';
export * from './srtParser';
export * from './timeline';
export * from './edits';
