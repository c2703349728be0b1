export * from './radar-display';
export * from './live-view-server';
