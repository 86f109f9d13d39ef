import { bigint, boolean, doublePrecision, index, integer, jsonb, pgTable, text, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';
import type { ImageStatus, ImageSummary, TaskMetadata, TaskStatus } from '../types';

export const analysisTasks = pgTable('analysis_tasks', {
  id: uuid('id').primaryKey(),
  status: varchar('status', { length: 20 }).$type<TaskStatus>().notNull(),
  routeName: varchar('route_name', { length: 255 }),
  totalFiles: integer('total_files').notNull().default(0),
  totalBytes: bigint('total_bytes', { mode: 'number' }).notNull().default(0),
  processedFiles: integer('processed_files').notNull().default(0),
  failedFiles: integer('failed_files').notNull().default(0),
  defectsFound: integer('defects_found').notNull().default(0),
  confidenceThreshold: doublePrecision('confidence_threshold').notNull(),
  previewLimit: integer('preview_limit').notNull(),
  message: text('message'),
  metadata: jsonb('metadata').$type<TaskMetadata>(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  completedAt: timestamp('completed_at', { withTimezone: true }),
});

export const analysisImages = pgTable(
  'analysis_images',
  {
    id: uuid('id').primaryKey(),
    taskId: uuid('task_id')
      .notNull()
      .references(() => analysisTasks.id, { onDelete: 'cascade' }),
    fileId: varchar('file_id', { length: 64 }).notNull(),
    fileName: varchar('file_name', { length: 512 }).notNull(),
    fileSize: bigint('file_size', { mode: 'number' }).notNull().default(0),
    status: varchar('status', { length: 20 }).$type<ImageStatus>().notNull(),
    resultFileId: varchar('result_file_id', { length: 64 }),
    isPreview: boolean('is_preview').notNull().default(false),
    summary: jsonb('summary').$type<ImageSummary>(),
    errorMessage: text('error_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    taskIdx: index('ix_analysis_images_task_id').on(table.taskId),
  }),
);

export type TaskRow = typeof analysisTasks.$inferSelect;
export type ImageRow = typeof analysisImages.$inferSelect;
