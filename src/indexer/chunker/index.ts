/**
 * Chunker Module
 *
 * Token-bounded splitting of forum posts into passages.
 */

export { splitText, chunkPosts, passageId, type ChunkOptions } from './chunker.js';
