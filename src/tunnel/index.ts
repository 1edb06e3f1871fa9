export * from './index-type';
export * from './row';
export * from './row-buffer';
export * from './cell-cursor';
export * from './tunnel';
