export * from './types/global';
export * from './mixin/depth-tracking';
export * from './sink/value-assembler';
