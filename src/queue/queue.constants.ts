export const INGESTION_QUEUE = 'clinical-ingestion';
export const INGEST_JOB_NAME = 'document.ingest';
