export * from './radar-renderer';
export * from './radar-background';
