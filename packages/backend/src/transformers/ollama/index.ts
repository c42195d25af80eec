export * from './chat';
export * from './embeddings';
export * from './generate';
export * from './keep-alive';
export * from './stream-transformer';
