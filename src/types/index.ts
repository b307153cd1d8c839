// sharestore type definitions

import type { Config } from '../config/index.js';
import type { FileStorage } from '../storage/file-storage.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    storage: FileStorage;
  }
}
