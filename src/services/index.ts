import type { ServiceDefinition } from '../supervisor/types';

export const genChunksService: ServiceDefinition = {
  name: 'app_gen_chunks.py',
  script: 'app_gen_chunks.py',
  command: 'gen-chunks-service',
  description: 'Document chunking service',
  argument: {
    flag: '--doc_dir',
    option: 'doc-dir',
    prompt: 'Directory to import into the knowledge base',
    label: 'Document directory',
    defaultValue: 'sample_doc',
  },
};

export const docChunkService: ServiceDefinition = {
  name: 'doc_chunk_service',
  script: 'Write_k_b_from_folder.py',
  command: 'doc-chunk-service',
  description: 'Knowledge-base writer service',
};
