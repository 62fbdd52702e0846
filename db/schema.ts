import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// One captured clipboard snapshot per row
export const clipsTable = sqliteTable(
  'clips',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    content: text('content').notNull(),
    content_type: text('content_type').notNull().default('text'),
    byte_size: integer('byte_size').notNull(),
    created_at: text('created_at').notNull(),
    label: text('label'),
  },
  (table) => ({
    labelIdx: index('idx_clips_label').on(table.label),
    contentTypeIdx: index('idx_clips_content_type').on(table.content_type),
  })
);

/**
 * FTS5 virtual table mirroring clips, keyed by rowid = clips.id
 * Created by the migrations, declared here only so queries can reference it.
 * Password rows are indexed with an empty content column.
 */
export const clipsFtsTable = sqliteTable('clips_fts', {
  rowid: integer('rowid').notNull(),
  content: text('content').notNull(),
  label: text('label'),
});
