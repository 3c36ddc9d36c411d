export * from './log';
export * from './errors';
export * from './metrics';
export * from './safety/switches';
export * from './time/clock';
export * from './time/session';
