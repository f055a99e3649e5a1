export * from './errors';
export * from './rect';
export * from './spatial-index';
export * from './input';
export * from './collision';
export * from './body';
export * from './level-gen';
export * from './static-world';
export * from './clear-sequence';
export * from './camera';
export * from './scheduler';
export * from './session';
