export * from './sweep-state';
export * from './sweep-reader';
export * from './serial-reader';
export * from './simulated-reader';
export * from './device-emulator';
export * from './emulated-reader';
export * from './reader-factory';
