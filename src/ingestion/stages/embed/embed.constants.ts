export const EMBEDDING_MODEL = 'EMBEDDING_MODEL';
