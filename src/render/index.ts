export * from './contracts';
export * from './frame';
export * from './terminal-surface';
