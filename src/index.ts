export {
  ResumableTokenizer,
  createTokenizerState,
  decodeStringToken,
  decodeTokenText,
  type CommentHandling,
  type TokenizerOptions,
  type TokenizerState
} from '../lib/resumable-tokenizer';

export { BufferPool, type BufferPoolOptions, type PooledBuffer } from '../lib/buffer-pool';

export * from './error';
export * from './source';
export * from './decode';
export * from './reader';
export * from './stream';

export type { Constructor, DeclaredType, TypeToken } from '../types/global';
