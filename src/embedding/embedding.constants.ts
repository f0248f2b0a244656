export const EMBEDDINGS_MODEL = Symbol('EMBEDDINGS_MODEL');
