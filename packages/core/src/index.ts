export * from './model';
export * from './errors';
export { CIRCLE_SHA1_MARKER, removeMarkerLines, sanitize } from './sanitize';
