import {
  index,
  json,
  mysqlEnum,
  mysqlTable,
  primaryKey,
  text,
  timestamp,
  varchar,
} from 'drizzle-orm/mysql-core';
import type { ClinicalRecord } from '../ingestion/stages/analyze/types/clinical.types';
import type { ProcessingResult } from '../ingestion/types/processing-result.types';

export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

/**
 * One row per submitted document run. `patientKey` is the document-store
 * key of the submitting patient, so job records can be removed with the
 * patient's data; it is null when the caller identifier was missing.
 */
export const ingestionJobs = mysqlTable(
  'ingestion_jobs',
  {
    id: varchar('id', { length: 36 }).primaryKey(),
    documentId: varchar('document_id', { length: 255 }).notNull(),
    patientKey: varchar('patient_key', { length: 64 }),
    mode: mysqlEnum('mode', ['sync', 'background']).notNull(),
    filename: varchar('filename', { length: 1024 }).notNull(),
    queueJobId: varchar('queue_job_id', { length: 100 }),
    status: mysqlEnum('status', JOB_STATUSES).notNull().default('pending'),
    result: json('result').$type<ProcessingResult>(),
    error: text('error'),
    startedAt: timestamp('started_at'),
    completedAt: timestamp('completed_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow().onUpdateNow(),
  },
  (table) => [
    index('idx_ingestion_jobs_document_id').on(table.documentId),
    index('idx_ingestion_jobs_patient_key').on(table.patientKey),
  ],
);

export type IngestionJob = typeof ingestionJobs.$inferSelect;
export type NewIngestionJob = typeof ingestionJobs.$inferInsert;

/**
 * Canonical copy of every clinical record.
 */
export const clinicalRecords = mysqlTable(
  'clinical_records',
  {
    patientKey: varchar('patient_key', { length: 64 }).notNull(),
    documentId: varchar('document_id', { length: 255 }).notNull(),
    documentTitle: varchar('document_title', { length: 255 }).notNull(),
    documentDate: varchar('document_date', { length: 64 }).notNull(),
    record: json('record').$type<ClinicalRecord>().notNull(),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow().onUpdateNow(),
  },
  (table) => [primaryKey({ columns: [table.patientKey, table.documentId] })],
);

export type ClinicalRecordRow = typeof clinicalRecords.$inferSelect;
export type NewClinicalRecordRow = typeof clinicalRecords.$inferInsert;

export const auditLog = mysqlTable(
  'audit_log',
  {
    id: varchar('id', { length: 36 }).primaryKey(),
    action: varchar('action', { length: 100 }).notNull(),
    patientRef: varchar('patient_ref', { length: 64 }).notNull(),
    documentId: varchar('document_id', { length: 255 }).notNull(),
    details: json('details').$type<Record<string, unknown>>().notNull(),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => [index('idx_audit_log_document_id').on(table.documentId)],
);

export type AuditLogRow = typeof auditLog.$inferSelect;
export type NewAuditLogRow = typeof auditLog.$inferInsert;
