export * from './logger';
export * from './transforms';
export * from './validators';
export * from './message-parser';
export * from './timing';
