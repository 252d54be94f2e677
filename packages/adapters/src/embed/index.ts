export type { Embedder } from './embedder';
export { CachingEmbedder } from './caching_embedder';
export { LocalHashEmbedder } from './local_hash_embedder';
