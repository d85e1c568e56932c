/**
 * Default Configuration Values
 *
 * Used when no config.toml exists or when it leaves fields out.
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  llm: {
    base_url: 'https://api.openai.com/v1',
    text_model: 'gpt-3.5-turbo',
    vision_model: 'gpt-4o',
    temperature: 0.7,
    max_completion_tokens: 1000,
    timeout_ms: 60000,
    max_retries: 2,
  },

  // text-embedding-3-small produces 1536-dimensional vectors
  embedding: {
    model: 'text-embedding-3-small',
    dimensions: 1536,
    batch_size: 64,
    timeout_ms: 30000,
  },

  // Local SQLite index by default so the project runs without a Pinecone account
  index: {
    backend: 'sqlite',
    pinecone_index: 'forum-ta',
    namespace: '',
    timeout_ms: 15000,
  },

  // 4096-token prompt, 500 tokens held back for the question and answer
  rag: {
    top_k: 7,
    max_context_tokens: 4096,
    reserved_tokens: 500,
    on_retrieval_error: 'apologize',
  },

  server: {
    host: '0.0.0.0',
    port: 8000,
    body_limit: '10mb',
  },

  forum: {
    base_url: 'https://forum.example.org',
    chunk_tokens: 600,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.forum-ta/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# forum-ta configuration
# API keys are read from the environment (OPENAI_API_KEY, PINECONE_API_KEY)

# Chat completions
[llm]
base_url = "${DEFAULT_CONFIG.llm.base_url}"   # or OPENAI_BASE_URL
text_model = "${DEFAULT_CONFIG.llm.text_model}"
vision_model = "${DEFAULT_CONFIG.llm.vision_model}"      # used when a question carries images
temperature = ${DEFAULT_CONFIG.llm.temperature}
max_completion_tokens = ${DEFAULT_CONFIG.llm.max_completion_tokens}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
max_retries = ${DEFAULT_CONFIG.llm.max_retries}

# Embeddings - dimensions must match the vector index
[embedding]
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Vector index: "sqlite" (local file) or "pinecone"
[index]
backend = "${DEFAULT_CONFIG.index.backend}"
pinecone_index = "${DEFAULT_CONFIG.index.pinecone_index}"
namespace = "${DEFAULT_CONFIG.index.namespace}"
# sqlite_path = "/path/to/passages.db"
timeout_ms = ${DEFAULT_CONFIG.index.timeout_ms}

# Answer pipeline
[rag]
top_k = ${DEFAULT_CONFIG.rag.top_k}
max_context_tokens = ${DEFAULT_CONFIG.rag.max_context_tokens}
reserved_tokens = ${DEFAULT_CONFIG.rag.reserved_tokens}
on_retrieval_error = "${DEFAULT_CONFIG.rag.on_retrieval_error}"   # or "continue" to answer without context

# HTTP API
[server]
host = "${DEFAULT_CONFIG.server.host}"
port = ${DEFAULT_CONFIG.server.port}           # or PORT
body_limit = "${DEFAULT_CONFIG.server.body_limit}"

# Forum the scraped topics come from
[forum]
base_url = "${DEFAULT_CONFIG.forum.base_url}"
chunk_tokens = ${DEFAULT_CONFIG.forum.chunk_tokens}
`;
