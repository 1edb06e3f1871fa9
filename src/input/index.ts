export * from './contracts';
export * from './keyboard';
