import { jsonb, pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import type { PlayerProgress } from '../types/index.js';

export const playerProgress = pgTable('player_progress', {
  userId: text('user_id').primaryKey(),
  progress: jsonb('progress').$type<PlayerProgress>().notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
