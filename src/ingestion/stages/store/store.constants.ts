export const STORAGE_BACKENDS = 'STORAGE_BACKENDS';
export const AUDIT_LOG = 'AUDIT_LOG';
export const NEO4J_DRIVER = 'NEO4J_DRIVER';
export const QDRANT_CLIENT = 'QDRANT_CLIENT';
export const PROFILE_STORE = 'PROFILE_STORE';
export const GRAPH_CLIENT = 'GRAPH_CLIENT';

export const VECTOR_COLLECTION = 'clinical_chunks';
