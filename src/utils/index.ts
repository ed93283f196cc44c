// Console output: colors, the semantic logger and the startup display.
export * from './banner';
export * from './colors';
export * from './logger';
export * from './startup';
