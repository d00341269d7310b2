// Public library surface.

export const VERSION = '0.1.0';

export * from './errors';
export * from './schema/types';
export * from './schema/record';
export * from './schema/converters';
export * from './schema/introspect';
export * from './schema/classify';
export * from './docs/docExtractor';
export * from './engine/flagEngine';
export * from './engine/commanderEngine';
export * from './engine/recordingEngine';
export * from './wrappers/arena';
export * from './wrappers/fieldWrapper';
export * from './wrappers/recordWrapper';
export * from './parsing/reconstruct';
export * from './parsing/argumentParser';
export * from './parsing/defaults';
export * from './util/deterministicJson';
export * from './util/log';
